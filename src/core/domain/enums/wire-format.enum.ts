/**
 * Native encoding of a channel's requests and notifications
 */
export enum WireFormat {
  /**
   * application/x-www-form-urlencoded
   */
  FORM = 'form',

  /**
   * Flat tagged markup document (one child element per field)
   */
  XML = 'xml',

  /**
   * Flat JSON object
   */
  JSON = 'json',
}
