import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { NotificationState, PaymentChannel } from '../domain/enums';
import { CallbackFailureError, InvalidKeyMaterialError } from '../domain/errors';
import { GatewayResult } from '../domain/models';
import {
  ErrorContext,
  LifecycleHooks,
  NotificationFateEvent,
  PaySealLogger,
} from '../interfaces/configuration.interface';
import { ChannelProfile } from './channel-profile';
import { getChannelDefinition } from './channels';
import { DispatchStage, ParseStage, ReceiveStage, VerificationStage } from './stages';
import {
  advance,
  NotificationCallback,
  NotificationContext,
  NotificationFields,
  NotificationOutcome,
  NotificationStage,
  RawNotification,
} from './types';
import { toBuffer } from './wire-codec';

export interface NotificationVerifierOptions {
  /**
   * Resolved channels; each signer must be able to verify
   */
  channels: ChannelProfile[];

  hooks?: LifecycleHooks;
  logger?: PaySealLogger;
}

/**
 * NotificationVerifier runs one inbound notification through
 * RECEIVED → PARSED → VERIFIED → DISPATCHED → ACKNOWLEDGED.
 *
 * Any failure in the first three states ends in REJECTED. Whatever happens,
 * `process` resolves with the channel's fixed acknowledgement body; parse,
 * signature and callback failures never surface as thrown errors.
 *
 * No deduplication is done: re-delivering the same bytes yields the same
 * acknowledgement and calls the callback again.
 */
export class NotificationVerifier {
  private readonly channels: ReadonlyMap<string, ChannelProfile>;
  private readonly stages: NotificationStage[];
  private readonly dispatchStage: DispatchStage;
  private readonly logger: PaySealLogger;
  private readonly hooks?: LifecycleHooks;

  constructor(options: NotificationVerifierOptions) {
    this.logger = options.logger ?? new Logger(NotificationVerifier.name);
    this.hooks = options.hooks;

    const channels = new Map<string, ChannelProfile>();
    for (const channel of options.channels) {
      if (!channel.signer.canVerify) {
        throw new InvalidKeyMaterialError(
          `Channel ${channel.definition.channel} has no key to verify notifications with`,
          channel.algorithm,
        );
      }
      channels.set(channel.definition.channel, channel);
    }
    this.channels = channels;

    this.stages = [
      new ReceiveStage(this.channels),
      new ParseStage(this.channels),
      new VerificationStage(this.channels),
    ];
    this.dispatchStage = new DispatchStage(this.logger);
  }

  /**
   * Verify a notification, dispatch it and decide the acknowledgement.
   *
   * @throws ConfigError only when `channel` is not a known payment channel
   */
  async process(
    channel: PaymentChannel,
    raw: RawNotification,
    callback: NotificationCallback,
  ): Promise<NotificationOutcome> {
    const definition = getChannelDefinition(channel);
    const startTime = Date.now();
    const context = this.createContext(channel, raw);
    context.callback = callback;

    if (this.runStages(context)) {
      await this.dispatchStage.execute(context);
    }

    const accepted = context.accepted === true && !context.error;
    advance(context, this.isRejected(context) ? NotificationState.REJECTED : NotificationState.ACKNOWLEDGED);

    const result = this.buildResult(context);
    const durationMs = Date.now() - startTime;

    const error = context.error;
    if (error) {
      this.logFailure(context);
      await this.invokeHook('onError', () => this.hooks?.onError?.(error, this.errorContext(context)));
    } else {
      this.logger.debug?.(`Notification acknowledged for ${channel} [${context.processingId}] in ${durationMs}ms`);
    }

    const fate: NotificationFateEvent = {
      processingId: context.processingId,
      channel,
      state: context.state,
      accepted,
      latencyMs: durationMs,
      errorCode: error?.code,
      error,
    };
    await this.invokeHook('onNotificationFate', () => this.hooks?.onNotificationFate?.(fate));

    return {
      processingId: context.processingId,
      channel,
      state: context.state,
      trail: [...context.trail],
      acknowledgement: accepted ? definition.acknowledgement.success : definition.acknowledgement.failure,
      contentType: definition.acknowledgement.contentType,
      result,
      durationMs,
    };
  }

  /**
   * Receive, parse and verify only; no callback and no acknowledgement
   */
  verify(channel: PaymentChannel, raw: RawNotification): GatewayResult<NotificationFields> {
    getChannelDefinition(channel);
    const context = this.createContext(channel, raw);

    if (!this.runStages(context)) {
      advance(context, NotificationState.REJECTED);
      this.logFailure(context);
    }
    return this.buildResult(context);
  }

  /**
   * Channels this verifier accepts notifications for
   */
  channelsConfigured(): PaymentChannel[] {
    return Array.from(this.channels.values(), (profile) => profile.definition.channel);
  }

  private createContext(channel: PaymentChannel, raw: RawNotification): NotificationContext {
    return {
      channel,
      rawBody: toBuffer(raw),
      receivedAt: new Date(),
      processingId: uuidv4(),
      state: NotificationState.RECEIVED,
      trail: [NotificationState.RECEIVED],
      metadata: {},
    };
  }

  /**
   * Execute the synchronous stages; false once a stage fails
   */
  private runStages(context: NotificationContext): boolean {
    for (const stage of this.stages) {
      const result = stage.execute(context);
      context.metadata[stage.name] = result.metadata ?? {};

      if (!result.success || !result.shouldContinue) {
        return result.success;
      }
    }
    return true;
  }

  private isRejected(context: NotificationContext): boolean {
    return context.error !== undefined && !context.trail.includes(NotificationState.DISPATCHED);
  }

  private buildResult(context: NotificationContext): GatewayResult<NotificationFields> {
    if (context.error) {
      return GatewayResult.fromError<NotificationFields>(context.error, context.text);
    }
    return GatewayResult.ok(context.verifiedFields, context.text);
  }

  private logFailure(context: NotificationContext): void {
    const error = context.error;
    if (!error) {
      return;
    }
    // Callback exceptions are already logged by the dispatch stage
    if (error instanceof CallbackFailureError && error.originalError) {
      return;
    }
    this.logger.warn(
      `Notification ${context.state} for ${context.channel} [${context.processingId}]: ${error.code} ${error.message}`,
    );
  }

  private errorContext(context: NotificationContext): ErrorContext {
    return {
      operation: 'notification-processing',
      channel: context.channel,
      processingId: context.processingId,
      state: context.state,
      metadata: context.metadata,
    };
  }

  /**
   * Hook failures are logged and never change the acknowledgement
   */
  private async invokeHook(name: keyof LifecycleHooks, invoke: () => void | Promise<void>): Promise<void> {
    try {
      await invoke();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Lifecycle hook ${name} failed: ${message}`);
    }
  }
}
