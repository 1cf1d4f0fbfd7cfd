/**
 * Schema Wiring
 *
 * Builds the runtime bindings (field resolvers, default resolver, type
 * discriminator, enum values) for individual schema types.
 *
 * @packageDocumentation
 */

// =============================================================================
// Wiring module - builders, records and strict mode
// =============================================================================
export * from './wiring/index.js';

// =============================================================================
// Logging module
// =============================================================================
export {
  type ComponentLogger,
  createLogger,
  createRootLogger,
  LOG_LEVELS,
  type LogFields,
  type LogLevel,
  loggerOptionsFromEnv,
} from './logging/index.js';
