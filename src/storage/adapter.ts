/**
 * Context Store
 *
 * Shared memory for context references: agents pass `ref#1` in a compact
 * message instead of repeating the full context, and the recipient resolves
 * it here.
 */

import { createLogger } from '../utils/logger.js';
import { ContextNotFoundError, ContextStoreError } from '../utils/errors.js';
import { ContextStoreConfigSchema } from '../config/schemas.js';
import type { ContextStoreConfig } from '../config/schemas.js';
import { loadWireConfig } from '../config/wire-config.js';

const log = createLogger('context-store');

/**
 * Lightweight health report for the CLI.
 * - persistent: true when values outlive the process
 * - driver: backing implementation identifier
 */
export interface ContextStoreHealth {
  persistent: boolean;
  driver: 'memory' | 'redis';
  canRead: boolean;
  canWrite: boolean;
  error?: string;
}

export type ContextLookup =
  | { status: 'found'; value: string }
  | { status: 'missing' }
  | { status: 'expired' };

export interface SetOptions {
  /** Overrides the store's default TTL for this entry. */
  ttlMs?: number;
}

export interface ContextStore {
  init(): Promise<void>;
  healthCheck(): Promise<ContextStoreHealth>;
  set(key: string, value: string, options?: SetOptions): Promise<void>;
  get(key: string): Promise<ContextLookup>;
  /** Resolve a reference or throw ContextNotFoundError. */
  require(key: string): Promise<string>;
  delete(key: string): Promise<boolean>;
  /** Live keys only, sorted. */
  keys(): Promise<string[]>;
  clear(): Promise<void>;
  close(): Promise<void>;
}

export function assertContextKey(key: string): void {
  if (key.trim() === '' || /\s/.test(key)) {
    throw new ContextStoreError(`invalid context key "${key}"`);
  }
}

export function resolveTtl(options: SetOptions | undefined, defaultTtlMs: number | undefined): number | undefined {
  const ttlMs = options?.ttlMs ?? defaultTtlMs;
  if (ttlMs !== undefined && (!Number.isInteger(ttlMs) || ttlMs <= 0)) {
    throw new ContextStoreError(`ttlMs must be a positive integer, got ${ttlMs}`);
  }
  return ttlMs;
}

interface MemoryEntry {
  value: string;
  expiresAt?: number;
}

export interface MemoryContextStoreOptions {
  defaultTtlMs?: number;
  clock?: () => number;
}

/**
 * In-memory context store (no persistence).
 *
 * An expired entry is reported once as `expired` by get(), then evicted.
 * set() and keys() also sweep every expired entry, so references that are
 * never read again do not accumulate; a swept reference reads as `missing`.
 */
export class MemoryContextStore implements ContextStore {
  private entries = new Map<string, MemoryEntry>();
  private readonly defaultTtlMs?: number;
  private readonly clock: () => number;

  constructor(options: MemoryContextStoreOptions = {}) {
    this.defaultTtlMs = options.defaultTtlMs;
    this.clock = options.clock ?? Date.now;
  }

  async init(): Promise<void> {
    // No initialization needed
  }

  async healthCheck(): Promise<ContextStoreHealth> {
    return {
      persistent: false,
      driver: 'memory',
      canRead: true,
      canWrite: true,
    };
  }

  /** Entries held, including expired ones not yet swept. */
  get size(): number {
    return this.entries.size;
  }

  async set(key: string, value: string, options?: SetOptions): Promise<void> {
    assertContextKey(key);
    const ttlMs = resolveTtl(options, this.defaultTtlMs);
    this.sweep();
    this.entries.set(key, ttlMs === undefined ? { value } : { value, expiresAt: this.clock() + ttlMs });
  }

  async get(key: string): Promise<ContextLookup> {
    const entry = this.entries.get(key);
    if (!entry) {
      return { status: 'missing' };
    }
    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return { status: 'expired' };
    }
    return { status: 'found', value: entry.value };
  }

  async require(key: string): Promise<string> {
    const result = await this.get(key);
    if (result.status !== 'found') {
      throw new ContextNotFoundError(key, result.status === 'expired');
    }
    return result.value;
  }

  async delete(key: string): Promise<boolean> {
    const entry = this.entries.get(key);
    if (!entry) return false;
    this.entries.delete(key);
    return !this.isExpired(entry);
  }

  async keys(): Promise<string[]> {
    this.sweep();
    return Array.from(this.entries.keys()).sort();
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  async close(): Promise<void> {
    this.entries = new Map();
  }

  private sweep(): void {
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
      }
    }
  }

  private isExpired(entry: MemoryEntry): boolean {
    return entry.expiresAt !== undefined && this.clock() >= entry.expiresAt;
  }
}

/**
 * Create a context store based on configuration.
 *
 * Explicit config wins over AGENTWIRE_* environment variables, which win over
 * the defaults (memory backend, `agentwire:` prefix).
 */
export async function createContextStore(config: Partial<ContextStoreConfig> = {}): Promise<ContextStore> {
  const envConfig = loadWireConfig().context;
  const merged = {
    backend: config.backend ?? envConfig.backend,
    url: config.url ?? envConfig.url,
    keyPrefix: config.keyPrefix ?? envConfig.keyPrefix,
    defaultTtlMs: config.defaultTtlMs ?? envConfig.defaultTtlMs,
  };

  const parsed = ContextStoreConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new ContextStoreError(`${issue?.path.join('.') ?? 'config'}: ${issue?.message ?? 'invalid value'}`);
  }
  const finalConfig = parsed.data;

  switch (finalConfig.backend) {
    case 'memory': {
      log.debug('Using in-memory context store (no persistence)');
      const store = new MemoryContextStore({ defaultTtlMs: finalConfig.defaultTtlMs });
      await store.init();
      return store;
    }

    case 'redis': {
      if (finalConfig.url === undefined) {
        throw new ContextStoreError('url is required for the redis backend');
      }
      const { RedisContextStore } = await import('./redis-adapter.js');
      log.debug('Using Redis context store', { prefix: finalConfig.keyPrefix });
      const store = new RedisContextStore({
        url: finalConfig.url,
        keyPrefix: finalConfig.keyPrefix,
        defaultTtlMs: finalConfig.defaultTtlMs,
      });
      await store.init();
      return store;
    }
  }
}
