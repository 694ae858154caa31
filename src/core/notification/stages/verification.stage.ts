import { NotificationState } from '../../domain/enums';
import { GatewayError, SignatureError } from '../../domain/errors';
import { buildSigningString, renderParamValue } from '../../signing/canonicalization';
import { ChannelProfile, signingRulesFor } from '../channel-profile';
import {
  advance,
  NotificationContext,
  NotificationStage,
  StageResult,
  stageFailure,
  stageSuccess,
} from '../types';

/**
 * Stage 3: Signature Verification
 * Removes the signature field and checks it against the rebuilt signing string
 */
export class VerificationStage implements NotificationStage {
  name = 'verification';

  constructor(private readonly channels: ReadonlyMap<string, ChannelProfile>) {}

  execute(context: NotificationContext): StageResult {
    const channel = this.channels.get(context.channel);
    const fields = context.fields;
    if (!channel || !fields) {
      return stageFailure(context, new SignatureError('Notification was not parsed', context.channel));
    }

    const signatureField = channel.definition.signatureField;
    const signature = fields.getString(signatureField);
    fields.remove(signatureField);

    if (!signature) {
      return stageFailure(
        context,
        new SignatureError(`Missing signature field '${signatureField}'`, context.channel),
      );
    }

    try {
      const rules = signingRulesFor(channel, 'notification');
      context.signingString = buildSigningString(fields, rules.profile, rules);

      if (!channel.signer.verify(context.signingString, signature)) {
        return stageFailure(
          context,
          new SignatureError('Signature verification failed', context.channel),
          { algorithm: channel.algorithm },
        );
      }
    } catch (error) {
      return stageFailure(
        context,
        error instanceof GatewayError
          ? error
          : new SignatureError(
              `Signature verification error: ${error instanceof Error ? error.message : String(error)}`,
              context.channel,
            ),
      );
    }

    context.verifiedFields = Object.freeze(
      Object.fromEntries(fields.entries().map(([key, value]): [string, string] => [key, renderParamValue(value)])),
    );

    advance(context, NotificationState.VERIFIED);
    return stageSuccess(context, { algorithm: channel.algorithm });
  }
}
