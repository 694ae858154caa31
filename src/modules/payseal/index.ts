/**
 * PaySeal NestJS Module
 *
 * Main module for integrating PaySeal into NestJS applications
 */

// Main module
export { PaySealModule } from './payseal.module';

// Configuration
export { PaySealModuleConfig, PaySealModuleAsyncConfig, defaultPaySealConfig } from './payseal.config';
export { channelConfigsFromEnv, paysealConfig } from './payseal.env';

// Services
export { PaySealService } from './services/payseal.service';
export { ConfigurationService } from './services/configuration.service';

// Injection tokens
export * from './constants';
