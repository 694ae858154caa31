import { NotificationState } from '../../domain/enums';
import { CallbackFailureError } from '../../domain/errors';
import { PaySealLogger } from '../../interfaces/configuration.interface';
import {
  advance,
  NotificationContext,
  StageResult,
  stageFailure,
  stageSuccess,
} from '../types';

/**
 * Stage 4: Dispatch
 * Hands verified fields to the caller's callback. A thrown error is caught
 * here, once, and becomes a CallbackFailureError.
 */
export class DispatchStage {
  name = 'dispatch';

  constructor(private readonly logger: PaySealLogger) {}

  async execute(context: NotificationContext): Promise<StageResult> {
    const { callback, verifiedFields } = context;
    if (!callback || !verifiedFields) {
      return stageFailure(context, new CallbackFailureError('No verified notification to dispatch'));
    }

    advance(context, NotificationState.DISPATCHED);
    const startTime = Date.now();

    let outcome: CallbackOutcome;
    try {
      const returned: unknown = await callback(verifiedFields, {
        channel: context.channel,
        processingId: context.processingId,
        receivedAt: context.receivedAt,
      });
      outcome = readOutcome(returned);
    } catch (error) {
      const originalError = error instanceof Error ? error : new Error(String(error));
      this.logger.error(
        `Notification callback threw for ${context.channel} [${context.processingId}]: ${originalError.message}`,
        originalError.stack,
      );
      context.accepted = false;
      return stageFailure(
        context,
        new CallbackFailureError(`Notification callback threw: ${originalError.message}`, originalError),
        { durationMs: Date.now() - startTime },
      );
    }

    context.accepted = outcome.accepted;

    if (!outcome.accepted) {
      return stageFailure(
        context,
        new CallbackFailureError(outcome.reason ?? 'Notification callback rejected the notification'),
        { durationMs: Date.now() - startTime },
      );
    }

    return stageSuccess(context, { durationMs: Date.now() - startTime });
  }
}

interface CallbackOutcome {
  accepted: boolean;
  reason?: string;
}

/**
 * Only `true` and `{ ok: true }` accept; any other return value rejects
 */
function readOutcome(returned: unknown): CallbackOutcome {
  if (returned === true) {
    return { accepted: true };
  }
  if (typeof returned !== 'object' || returned === null || !('ok' in returned)) {
    return { accepted: false };
  }
  if (returned.ok === true) {
    return { accepted: true };
  }
  const reason = 'reason' in returned && typeof returned.reason === 'string' ? returned.reason : undefined;
  return { accepted: false, reason };
}
