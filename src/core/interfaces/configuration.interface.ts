import { NotificationState, PaymentChannel, SigningProfile } from '../domain/enums';
import { KeyMaterial, SignerFactory } from './signer.interface';

/**
 * Main PaySeal configuration
 */
export interface PaySealConfig {
  /**
   * One entry per enabled channel
   */
  channels: ChannelConfig[];

  /**
   * Custom signer registrations, applied on top of the built-ins.
   * An identifier that matches a built-in replaces it.
   */
  signers?: Record<string, SignerFactory>;

  /**
   * Lifecycle hooks for monitoring and metrics
   */
  hooks?: LifecycleHooks;

  /**
   * Logging configuration
   */
  logging?: LoggingConfig;
}

/**
 * Per-channel signing configuration
 */
export interface ChannelConfig {
  channel: PaymentChannel;

  /**
   * Registry identifier; defaults to the channel's default algorithm
   */
  algorithm?: string;

  /**
   * Canonicalization profile; defaults to the profile the channel uses for
   * the chosen algorithm
   */
  profile?: SigningProfile;

  keys: KeyMaterial;

  /**
   * Fields left out of the notification signing string, in addition to the
   * channel's own notification-only exclusions
   */
  notificationExclusions?: string[];
}

/**
 * Logging configuration
 */
export interface LoggingConfig {
  /**
   * Custom logger instance; defaults to the NestJS Logger
   */
  logger?: PaySealLogger;
}

/**
 * Logger interface (structurally satisfied by NestJS LoggerService)
 */
export interface PaySealLogger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  log(message: string, ...args: unknown[]): void;
  debug?(message: string, ...args: unknown[]): void;
  verbose?(message: string, ...args: unknown[]): void;
}

/**
 * Lifecycle hooks for monitoring and metrics
 */
export interface LifecycleHooks {
  /**
   * Called once per notification after its acknowledgement is decided
   */
  onNotificationFate?: (event: NotificationFateEvent) => void | Promise<void>;

  /**
   * Called when a notification is rejected or the callback fails
   */
  onError?: (error: Error, context: ErrorContext) => void | Promise<void>;
}

/**
 * Notification fate event
 */
export interface NotificationFateEvent {
  processingId: string;
  channel: PaymentChannel;
  state: NotificationState;
  accepted: boolean;
  latencyMs: number;
  errorCode?: string;
  error?: Error;
}

/**
 * Error context
 */
export interface ErrorContext {
  operation: string;
  channel?: PaymentChannel;
  processingId?: string;
  state?: NotificationState;
  metadata?: Record<string, unknown>;
}
