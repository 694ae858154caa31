/**
 * PaySeal Core - canonicalization, signing and notification verification
 * Transport and framework agnostic
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';
export * from './domain/errors';

// Interfaces and contracts
export * from './interfaces';

// Signing
export * from './signing';

// Notification verification
export * from './notification';

// Core services
export * from './services';
