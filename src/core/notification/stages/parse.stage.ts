import { NotificationState } from '../../domain/enums';
import { FormatError, GatewayError } from '../../domain/errors';
import { ChannelProfile } from '../channel-profile';
import {
  advance,
  NotificationContext,
  NotificationStage,
  StageResult,
  stageFailure,
  stageSuccess,
} from '../types';
import { decodePayload, decodeText } from '../wire-codec';

/**
 * Stage 2: Parse
 * Decodes the body (strict UTF-8, then the channel's wire format) into a container
 */
export class ParseStage implements NotificationStage {
  name = 'parse';

  constructor(private readonly channels: ReadonlyMap<string, ChannelProfile>) {}

  execute(context: NotificationContext): StageResult {
    const channel = this.channels.get(context.channel);
    if (!channel) {
      return stageFailure(context, new FormatError(`No wire format known for channel ${context.channel}`));
    }

    try {
      context.text = decodeText(context.rawBody);
      context.fields = decodePayload(
        channel.definition.wireFormat,
        context.text,
        channel.definition.xmlRootTag,
      );
    } catch (error) {
      return stageFailure(
        context,
        error instanceof GatewayError
          ? error
          : new FormatError(`Unable to decode notification: ${error instanceof Error ? error.message : String(error)}`),
      );
    }

    advance(context, NotificationState.PARSED);
    return stageSuccess(context, {
      wireFormat: channel.definition.wireFormat,
      fieldCount: context.fields.size,
    });
  }
}
