/**
 * Centralized DTOs for PaySeal configuration
 *
 * These DTOs provide runtime validation for configuration that arrives as
 * plain data (environment, JSON files, remote config).
 */

export * from './channel-config.dto';
