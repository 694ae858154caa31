import { Injectable, Inject, Logger } from '@nestjs/common';
import type {
  ChannelSigningService,
  GatewayResult,
  KeyMaterial,
  NotificationCallback,
  NotificationFields,
  NotificationOutcome,
  NotificationVerifier,
  ParamMap,
  ParamRecord,
  PaymentChannel,
  RawNotification,
  Signer,
  SignerFactory,
  SignerRegistry,
} from '../../../core';
import { CHANNEL_SIGNING_SERVICE, NOTIFICATION_VERIFIER, SIGNER_REGISTRY } from '../constants';

/**
 * PaySealService
 *
 * Main service providing high-level PaySeal operations
 */
@Injectable()
export class PaySealService {
  private readonly logger = new Logger(PaySealService.name);

  constructor(
    @Inject(NOTIFICATION_VERIFIER)
    private readonly notificationVerifier: NotificationVerifier,
    @Inject(CHANNEL_SIGNING_SERVICE)
    private readonly signingService: ChannelSigningService,
    @Inject(SIGNER_REGISTRY)
    private readonly signerRegistry: SignerRegistry,
  ) {}

  /**
   * Process an inbound notification and return the acknowledgement to send back
   */
  async handleNotification(
    channel: PaymentChannel,
    raw: RawNotification,
    callback: NotificationCallback,
  ): Promise<NotificationOutcome> {
    return this.notificationVerifier.process(channel, raw, callback);
  }

  /**
   * Parse and verify a notification without dispatching it
   */
  verifyNotification(channel: PaymentChannel, raw: RawNotification): GatewayResult<NotificationFields> {
    return this.notificationVerifier.verify(channel, raw);
  }

  buildSigningString(channel: PaymentChannel, params: ParamMap): string {
    return this.signingService.buildSigningString(channel, params);
  }

  /**
   * Sign an outbound request in place
   */
  sign(channel: PaymentChannel, params: ParamMap): ParamMap {
    return this.signingService.sign(channel, params);
  }

  /**
   * Sign an outbound request and encode it in the channel's wire format
   */
  signToWire(channel: PaymentChannel, params: ParamMap): string {
    return this.signingService.signToWire(channel, params);
  }

  /**
   * Verify a synchronous provider response
   */
  verifyResponse(channel: PaymentChannel, params: ParamMap): GatewayResult<ParamRecord> {
    return this.signingService.verifyResponse(channel, params);
  }

  /**
   * Register (or replace) a signer algorithm at runtime.
   * Channels already assembled keep the signer they were built with.
   */
  registerSigner(identifier: string, factory: SignerFactory): void {
    const replaced = this.signerRegistry.has(identifier);
    this.signerRegistry.register(identifier, factory);
    this.logger.log(`${replaced ? 'Replaced' : 'Registered'} signer ${identifier}`);
  }

  /**
   * Build a standalone signer from the shared registry
   */
  createSigner(identifier: string, keys: KeyMaterial): Signer {
    return this.signerRegistry.get(identifier, keys);
  }

  /**
   * Channels available for outbound signing
   */
  configuredChannels(): PaymentChannel[] {
    return this.signingService.configuredChannels();
  }

  /**
   * Channels accepting inbound notifications
   */
  notificationChannels(): PaymentChannel[] {
    return this.notificationVerifier.channelsConfigured();
  }
}
