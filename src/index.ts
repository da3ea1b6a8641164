/**
 * agentwire
 *
 * Compact and structured message formats for agent-to-agent traffic, with a
 * shared verb vocabulary and a context store for large payloads.
 */

export * from './protocol/index.js';

export {
  CodecConfigSchema,
  ContextStoreConfigSchema,
  LoggingConfigSchema,
  WireConfigSchema,
  jsonSchemas,
} from './config/schemas.js';
export type { CodecConfig, ContextStoreConfig, LoggingConfig, WireConfig } from './config/schemas.js';
export {
  DEFAULT_CODEC_CONFIG,
  DEFAULT_CONTEXT_STORE_CONFIG,
  DEFAULT_LOGGING_CONFIG,
  DEFAULT_WIRE_CONFIG,
  loadWireConfig,
} from './config/wire-config.js';

// Redis store is loaded lazily by createContextStore()
export { MemoryContextStore, createContextStore } from './storage/adapter.js';
export type {
  ContextLookup,
  ContextStore,
  ContextStoreHealth,
  MemoryContextStoreOptions,
  SetOptions,
} from './storage/adapter.js';

export { AgentwireError, ConfigError, ContextNotFoundError, ContextStoreError, errorKind } from './utils/errors.js';
export { configureLogging, createLogger, loggingSettings } from './utils/logger.js';
export type { LogLevel, Logger } from './utils/logger.js';
