import { describe, it, expect } from 'vitest';
import {
  CodecConfigSchema,
  ContextStoreConfigSchema,
  LoggingConfigSchema,
  WireConfigSchema,
  jsonSchemas,
} from './schemas.js';
import { DEFAULT_CODEC_CONFIG, DEFAULT_CONTEXT_STORE_CONFIG, DEFAULT_LOGGING_CONFIG, DEFAULT_WIRE_CONFIG } from './wire-config.js';

describe('config schemas', () => {
  it('validates codec defaults', () => {
    expect(CodecConfigSchema.parse(DEFAULT_CODEC_CONFIG)).toEqual(DEFAULT_CODEC_CONFIG);
  });

  it('validates context store defaults', () => {
    expect(ContextStoreConfigSchema.parse(DEFAULT_CONTEXT_STORE_CONFIG)).toEqual(DEFAULT_CONTEXT_STORE_CONFIG);
  });

  it('validates logging defaults', () => {
    expect(LoggingConfigSchema.parse(DEFAULT_LOGGING_CONFIG)).toEqual(DEFAULT_LOGGING_CONFIG);
  });

  it('validates the combined defaults', () => {
    expect(WireConfigSchema.parse(DEFAULT_WIRE_CONFIG)).toEqual(DEFAULT_WIRE_CONFIG);
  });

  it('requires a url for the redis backend', () => {
    const result = ContextStoreConfigSchema.safeParse({ backend: 'redis', keyPrefix: 'agentwire:' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['url']);
    }
  });

  it('accepts a redis backend with a url', () => {
    const cfg = { backend: 'redis', url: 'redis://localhost:6379', keyPrefix: 'wire:', defaultTtlMs: 60_000 };
    expect(ContextStoreConfigSchema.parse(cfg)).toEqual(cfg);
  });

  it('rejects a non-positive ttl', () => {
    expect(ContextStoreConfigSchema.safeParse({ backend: 'memory', keyPrefix: 'x', defaultTtlMs: 0 }).success).toBe(false);
  });

  it('exports identified JSON schemas', () => {
    expect(jsonSchemas.wire.$id).toBe('AgentwireConfig');
    expect(jsonSchemas.codec.$id).toBe('AgentwireCodecConfig');
  });
});
