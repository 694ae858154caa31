import { Injectable, Inject } from '@nestjs/common';
import type { ChannelConfig, LifecycleHooks, PaymentChannel } from '../../../core';
import type { PaySealModuleConfig } from '../payseal.config';
import { PAYSEAL_CONFIG } from '../constants';

/**
 * Configuration Service
 *
 * Provides access to the validated PaySeal configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(PAYSEAL_CONFIG)
    private readonly config: PaySealModuleConfig,
  ) {}

  /**
   * Get full configuration
   */
  getConfig(): PaySealModuleConfig {
    return this.config;
  }

  /**
   * Get configuration of one channel
   */
  getChannelConfig(channel: PaymentChannel): ChannelConfig | undefined {
    return this.config.channels.find((entry) => entry.channel === channel);
  }

  getHooks(): LifecycleHooks | undefined {
    return this.config.hooks;
  }

  /**
   * Custom signer identifiers registered through configuration
   */
  getCustomSignerIds(): string[] {
    return Object.keys(this.config.signers ?? {});
  }
}
