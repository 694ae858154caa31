/**
 * PaySeal - payment channel signing and notification verification
 *
 * Canonicalizes, signs and verifies payment provider messages, and turns
 * inbound notifications into the exact acknowledgement each channel expects.
 */
import 'reflect-metadata';

// Export all core components
export * from './core';

// Export configuration DTOs and testing utilities
export * from './_shared';

// Export NestJS module, services, configuration and injection tokens
export * from './modules';
