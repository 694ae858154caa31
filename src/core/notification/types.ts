import { NotificationState, PaymentChannel } from '../domain/enums';
import { GatewayError } from '../domain/errors';
import { GatewayResult, ParamMap } from '../domain/models';

/**
 * Decoded notification fields; every value is text
 */
export type NotificationFields = Readonly<Record<string, string>>;

/**
 * Explicit business outcome returned by a notification callback
 */
export type CallbackResult = { ok: true } | { ok: false; reason?: string };

/**
 * Callbacks report expected business failures by returning `false` or
 * `{ ok: false }`. A thrown error is caught once, logged and treated as a
 * failure. Callbacks must tolerate re-delivery of the same notification.
 */
export type NotificationCallback = (
  fields: NotificationFields,
  info: NotificationInfo,
) => boolean | CallbackResult | Promise<boolean | CallbackResult>;

export interface NotificationInfo {
  channel: PaymentChannel;
  processingId: string;
  receivedAt: Date;
}

/**
 * Raw notification body as handed over by the transport layer
 */
export type RawNotification = Buffer | Uint8Array | string;

/**
 * Notification processing context passed through the stages
 */
export interface NotificationContext {
  // Raw input
  channel: PaymentChannel;
  rawBody: Buffer;
  receivedAt: Date;

  // Processing metadata
  processingId: string;
  state: NotificationState;
  trail: NotificationState[];

  // Parsing
  text?: string;
  fields?: ParamMap;

  // Verification
  signingString?: string;
  verifiedFields?: NotificationFields;

  // Dispatch
  callback?: NotificationCallback;
  accepted?: boolean;

  // Processing outcome
  error?: GatewayError;
  metadata: Record<string, unknown>;
}

/**
 * Stage result
 */
export interface StageResult {
  success: boolean;
  context: NotificationContext;
  error?: GatewayError;
  shouldContinue: boolean;
  metadata?: Record<string, unknown>;
}

/**
 * Synchronous stage (receive, parse, verify)
 */
export interface NotificationStage {
  name: string;
  execute(context: NotificationContext): StageResult;
}

/**
 * Final outcome of one `process` call
 */
export interface NotificationOutcome {
  processingId: string;
  channel: PaymentChannel;

  /**
   * ACKNOWLEDGED or REJECTED
   */
  state: NotificationState;

  /**
   * Every state visited, in order
   */
  trail: NotificationState[];

  /**
   * Exact body to return to the provider
   */
  acknowledgement: string;
  contentType: string;

  result: GatewayResult<NotificationFields>;
  durationMs: number;
}

export function advance(context: NotificationContext, state: NotificationState): void {
  context.state = state;
  context.trail.push(state);
}

export function stageFailure(
  context: NotificationContext,
  error: GatewayError,
  metadata?: Record<string, unknown>,
): StageResult {
  context.error = error;
  return { success: false, context, error, shouldContinue: false, metadata };
}

export function stageSuccess(context: NotificationContext, metadata?: Record<string, unknown>): StageResult {
  return { success: true, context, shouldContinue: true, metadata };
}
