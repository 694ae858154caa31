import { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import { PaySealConfig } from '../../core';

/**
 * PaySeal Module Configuration
 */
export interface PaySealModuleConfig extends PaySealConfig {
  /**
   * Re-validate `channels` with class-validator before assembly.
   * Turn off only when the configuration is built and typed in code.
   */
  validate?: boolean;
}

/**
 * Async configuration factory
 */
export interface PaySealModuleAsyncConfig {
  imports?: ModuleMetadata['imports'];
  inject?: FactoryProvider['inject'];
  useFactory(...args: unknown[]): Promise<PaySealModuleConfig> | PaySealModuleConfig;
}

/**
 * Default configuration values
 */
export const defaultPaySealConfig: Omit<PaySealModuleConfig, 'channels'> = {
  validate: true,
};
