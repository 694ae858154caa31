import { Logger } from '@nestjs/common';
import { PaymentChannel } from '../domain/enums';
import { ConfigError, GatewayError, InvalidKeyMaterialError, SignatureError } from '../domain/errors';
import { GatewayResult, ParamMap, ParamRecord } from '../domain/models';
import { PaySealLogger } from '../interfaces/configuration.interface';
import { ChannelProfile, signingRulesFor } from '../notification/channel-profile';
import { encodePayload } from '../notification/wire-codec';

/**
 * Outbound signing service
 *
 * Builds signing strings for provider requests, signs them, serializes the
 * signed container for transport and verifies synchronous responses.
 * Key errors are thrown so nothing unsigned ever reaches the network.
 */
export class ChannelSigningService {
  private readonly channels: ReadonlyMap<string, ChannelProfile>;
  private readonly logger: PaySealLogger;

  constructor(channels: ChannelProfile[], logger?: PaySealLogger) {
    this.channels = new Map(channels.map((profile) => [profile.definition.channel, profile]));
    this.logger = logger ?? new Logger(ChannelSigningService.name);
  }

  /**
   * Canonical string the channel's signer signs for these parameters
   */
  buildSigningString(channel: PaymentChannel, params: ParamMap): string {
    return params.toSigningText(signingRulesFor(this.profileFor(channel), 'outbound'));
  }

  /**
   * Sign in place: any stale signature is replaced
   *
   * @throws InvalidKeyMaterialError when the channel has no signing key
   */
  sign(channel: PaymentChannel, params: ParamMap): ParamMap {
    const profile = this.profileFor(channel);
    if (!profile.signer.canSign) {
      throw new InvalidKeyMaterialError(`Channel ${channel} has no key to sign requests with`, profile.algorithm);
    }

    const signatureField = profile.definition.signatureField;
    params.remove(signatureField);
    params.set(signatureField, profile.signer.sign(this.buildSigningString(channel, params)));

    this.logger.debug?.(`Signed ${params.size - 1} fields for ${channel} with ${profile.algorithm}`);
    return params;
  }

  /**
   * Sign, then encode in the channel's wire format
   */
  signToWire(channel: PaymentChannel, params: ParamMap): string {
    const profile = this.profileFor(channel);
    this.sign(channel, params);
    return encodePayload(profile.definition.wireFormat, params, profile.definition.xmlRootTag);
  }

  /**
   * Verify a synchronous provider response. The caller's container is not
   * modified; the result carries the fields without the signature.
   */
  verifyResponse(channel: PaymentChannel, params: ParamMap): GatewayResult<ParamRecord> {
    const profile = this.profileFor(channel);
    const signatureField = profile.definition.signatureField;
    const fields = params.clone();
    const signature = fields.getString(signatureField);
    fields.remove(signatureField);

    if (!signature) {
      return GatewayResult.fromError(new SignatureError(`Missing signature field '${signatureField}'`, channel));
    }

    try {
      if (!profile.signer.verify(this.buildSigningString(channel, fields), signature)) {
        this.logger.warn(`Response signature verification failed for ${channel}`);
        return GatewayResult.fromError(new SignatureError('Signature verification failed', channel));
      }
    } catch (error) {
      if (error instanceof GatewayError) {
        return GatewayResult.fromError(error);
      }
      throw error;
    }

    return GatewayResult.ok(fields.toMapping());
  }

  configuredChannels(): PaymentChannel[] {
    return Array.from(this.channels.values(), (profile) => profile.definition.channel);
  }

  private profileFor(channel: PaymentChannel): ChannelProfile {
    const profile = this.channels.get(channel);
    if (!profile) {
      throw new ConfigError(`Channel ${channel} is not configured`);
    }
    return profile;
  }
}
