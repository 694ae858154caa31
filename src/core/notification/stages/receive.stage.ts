import { ConfigError, FormatError } from '../../domain/errors';
import { ChannelProfile } from '../channel-profile';
import { NotificationContext, NotificationStage, StageResult, stageFailure, stageSuccess } from '../types';

/**
 * Stage 1: Receive
 * Rejects empty bodies and channels without a verification profile
 */
export class ReceiveStage implements NotificationStage {
  name = 'receive';

  constructor(private readonly channels: ReadonlyMap<string, ChannelProfile>) {}

  execute(context: NotificationContext): StageResult {
    if (!this.channels.has(context.channel)) {
      return stageFailure(
        context,
        new ConfigError(`Channel ${context.channel} is not configured for notification verification`),
      );
    }

    if (context.rawBody.length === 0) {
      return stageFailure(context, new FormatError('Notification body is empty'));
    }

    return stageSuccess(context, { bytes: context.rawBody.length });
  }
}
