/**
 * States of a single inbound notification.
 * Every notification ends in ACKNOWLEDGED or REJECTED; none is silently dropped.
 */
export enum NotificationState {
  /**
   * Raw bytes and declared channel accepted
   */
  RECEIVED = 'received',

  /**
   * Bytes decoded into a container
   */
  PARSED = 'parsed',

  /**
   * Signature checked against the rebuilt signing string
   */
  VERIFIED = 'verified',

  /**
   * Verified fields handed to the caller's callback
   */
  DISPATCHED = 'dispatched',

  /**
   * Callback outcome translated into the channel's acknowledgement
   */
  ACKNOWLEDGED = 'acknowledged',

  /**
   * Terminated early by a format or signature error
   */
  REJECTED = 'rejected',
}
