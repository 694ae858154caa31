/**
 * PaySeal Shared Resources
 *
 * Centralized exports for all shared components used across the library
 */

// DTOs for configuration validation
export * from './dto';

// Testing utilities
export * from './testing/mock-notification-factory';
