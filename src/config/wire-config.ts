/**
 * Runtime configuration for agentwire.
 *
 * Defaults are overridden by AGENTWIRE_* environment variables and the merged
 * result is validated with WireConfigSchema.
 */

import { ConfigError } from '../utils/errors.js';
import { WireConfigSchema } from './schemas.js';
import type { WireConfig } from './schemas.js';

export const DEFAULT_CODEC_CONFIG = {
  strict: true,
  warnUnknownVerbs: true,
} as const;

export const DEFAULT_CONTEXT_STORE_CONFIG = {
  backend: 'memory',
  keyPrefix: 'agentwire:',
} as const;

export const DEFAULT_LOGGING_CONFIG = {
  level: 'INFO',
  json: false,
} as const;

export const DEFAULT_WIRE_CONFIG: WireConfig = {
  codec: { ...DEFAULT_CODEC_CONFIG },
  context: { ...DEFAULT_CONTEXT_STORE_CONFIG },
  logging: { ...DEFAULT_LOGGING_CONFIG },
};

type Env = Record<string, string | undefined>;

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

function readBoolean(env: Env, name: string): boolean | undefined {
  const value = readEnv(env, name);
  if (value === undefined) return undefined;
  switch (value.toLowerCase()) {
    case '1':
    case 'true':
      return true;
    case '0':
    case 'false':
      return false;
    default:
      throw new ConfigError(name, `expected 1, 0, true or false, got "${value}"`);
  }
}

function readInteger(env: Env, name: string): number | undefined {
  const value = readEnv(env, name);
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) {
    throw new ConfigError(name, `expected a whole number, got "${value}"`);
  }
  return Number(value);
}

/**
 * Resolve configuration from defaults and environment variables.
 */
export function loadWireConfig(env: Env = process.env): WireConfig {
  const candidate = {
    codec: {
      strict: readBoolean(env, 'AGENTWIRE_STRICT') ?? DEFAULT_CODEC_CONFIG.strict,
      warnUnknownVerbs: readBoolean(env, 'AGENTWIRE_WARN_UNKNOWN_VERBS') ?? DEFAULT_CODEC_CONFIG.warnUnknownVerbs,
    },
    context: {
      backend: readEnv(env, 'AGENTWIRE_CONTEXT_BACKEND')?.toLowerCase() ?? DEFAULT_CONTEXT_STORE_CONFIG.backend,
      url: readEnv(env, 'AGENTWIRE_REDIS_URL'),
      keyPrefix: readEnv(env, 'AGENTWIRE_CONTEXT_PREFIX') ?? DEFAULT_CONTEXT_STORE_CONFIG.keyPrefix,
      defaultTtlMs: readInteger(env, 'AGENTWIRE_CONTEXT_TTL_MS'),
    },
    logging: {
      level: readEnv(env, 'AGENTWIRE_LOG_LEVEL')?.toUpperCase() ?? DEFAULT_LOGGING_CONFIG.level,
      json: readBoolean(env, 'AGENTWIRE_LOG_JSON') ?? DEFAULT_LOGGING_CONFIG.json,
      file: readEnv(env, 'AGENTWIRE_LOG_FILE'),
    },
  };

  const result = WireConfigSchema.safeParse(candidate);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new ConfigError(issue?.path.join('.') ?? '(root)', issue?.message ?? 'invalid value');
  }
  return result.data;
}
