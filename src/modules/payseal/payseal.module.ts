import 'reflect-metadata';
import { DynamicModule, Global, Logger, Module, Provider } from '@nestjs/common';
import {
  ChannelProfile,
  ChannelSigningService,
  createDefaultSignerRegistry,
  NotificationVerifier,
  resolveChannelProfiles,
  SignerRegistry,
} from '../../core';
import { validateChannelConfigs } from '../../_shared/dto';
import {
  PaySealModuleConfig,
  PaySealModuleAsyncConfig,
  defaultPaySealConfig,
} from './payseal.config';
import {
  CHANNEL_PROFILES,
  CHANNEL_SIGNING_SERVICE,
  NOTIFICATION_VERIFIER,
  PAYSEAL_CONFIG,
  SIGNER_REGISTRY,
} from './constants';
import { PaySealService } from './services/payseal.service';
import { ConfigurationService } from './services/configuration.service';

const EXPORTED_TOKENS = [
  PAYSEAL_CONFIG,
  SIGNER_REGISTRY,
  NOTIFICATION_VERIFIER,
  CHANNEL_SIGNING_SERVICE,
  PaySealService,
  ConfigurationService,
];

/**
 * PaySeal Module - Main NestJS Module
 *
 * The single assembly point: builds the signer registry, resolves every
 * configured channel once and exposes the verifier and signing service.
 */
@Global()
@Module({})
export class PaySealModule {
  private static readonly logger = new Logger(PaySealModule.name);

  /**
   * Configure PaySeal synchronously
   */
  static forRoot(config: PaySealModuleConfig): DynamicModule {
    return {
      module: PaySealModule,
      providers: [
        {
          provide: PAYSEAL_CONFIG,
          useValue: this.prepareConfig(config),
        },
        ...this.createProviders(),
      ],
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Configure PaySeal asynchronously
   */
  static forRootAsync(options: PaySealModuleAsyncConfig): DynamicModule {
    return {
      module: PaySealModule,
      imports: options.imports ?? [],
      providers: [
        {
          provide: PAYSEAL_CONFIG,
          useFactory: async (...args: unknown[]) => this.prepareConfig(await options.useFactory(...args)),
          inject: options.inject ?? [],
        },
        ...this.createProviders(),
      ],
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Merge defaults and validate channel configuration
   */
  static prepareConfig(config: PaySealModuleConfig): PaySealModuleConfig {
    const merged: PaySealModuleConfig = { ...defaultPaySealConfig, ...config };
    if (merged.validate !== false) {
      merged.channels = validateChannelConfigs(merged.channels);
    }
    return merged;
  }

  /**
   * Providers shared by both registration styles; all depend on PAYSEAL_CONFIG
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: SIGNER_REGISTRY,
        useFactory: (config: PaySealModuleConfig) => {
          const registry = createDefaultSignerRegistry();
          for (const [identifier, factory] of Object.entries(config.signers ?? {})) {
            registry.register(identifier, factory);
          }
          return registry;
        },
        inject: [PAYSEAL_CONFIG],
      },
      {
        provide: CHANNEL_PROFILES,
        useFactory: (config: PaySealModuleConfig, registry: SignerRegistry) =>
          resolveChannelProfiles(config.channels, registry),
        inject: [PAYSEAL_CONFIG, SIGNER_REGISTRY],
      },
      {
        provide: NOTIFICATION_VERIFIER,
        useFactory: (config: PaySealModuleConfig, profiles: ChannelProfile[]) => {
          const verifiable = profiles.filter((profile) => {
            if (!profile.signer.canVerify) {
              this.logger.warn(
                `Channel ${profile.definition.channel} has no verification key; its notifications will be rejected`,
              );
            }
            return profile.signer.canVerify;
          });
          return new NotificationVerifier({
            channels: verifiable,
            hooks: config.hooks,
            logger: config.logging?.logger,
          });
        },
        inject: [PAYSEAL_CONFIG, CHANNEL_PROFILES],
      },
      {
        provide: CHANNEL_SIGNING_SERVICE,
        useFactory: (config: PaySealModuleConfig, profiles: ChannelProfile[]) =>
          new ChannelSigningService(profiles, config.logging?.logger),
        inject: [PAYSEAL_CONFIG, CHANNEL_PROFILES],
      },
      {
        provide: PaySealService,
        useClass: PaySealService,
      },
      {
        provide: ConfigurationService,
        useClass: ConfigurationService,
      },
    ];
  }
}
