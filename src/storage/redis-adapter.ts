/**
 * Redis-backed context store.
 *
 * Keys are namespaced by `keyPrefix`; TTLs are set with PX so Redis expires
 * entries itself. Redis does not remember expired keys, so an expired
 * reference reads as `missing`.
 */

import { createClient } from 'redis';
import { createLogger } from '../utils/logger.js';
import { ContextNotFoundError, ContextStoreError } from '../utils/errors.js';
import { assertContextKey, resolveTtl } from './adapter.js';
import type { ContextLookup, ContextStore, ContextStoreHealth, SetOptions } from './adapter.js';

const log = createLogger('context-store');

type RedisClient = ReturnType<typeof createClient>;

export interface RedisContextStoreOptions {
  url: string;
  keyPrefix: string;
  defaultTtlMs?: number;
}

export class RedisContextStore implements ContextStore {
  private client: RedisClient | null = null;
  private readonly options: RedisContextStoreOptions;
  private lastError?: string;

  constructor(options: RedisContextStoreOptions) {
    this.options = options;
  }

  async init(): Promise<void> {
    if (this.client) return;
    const client = createClient({ url: this.options.url });
    client.on('error', (err: unknown) => {
      this.lastError = err instanceof Error ? err.message : String(err);
      log.warn('Redis client error', { error: this.lastError });
    });
    try {
      await client.connect();
    } catch (err) {
      throw new ContextStoreError(`cannot connect to Redis: ${err instanceof Error ? err.message : String(err)}`);
    }
    this.client = client;
    log.info('Connected to Redis context store', { prefix: this.options.keyPrefix });
  }

  async healthCheck(): Promise<ContextStoreHealth> {
    if (!this.client) {
      return { persistent: true, driver: 'redis', canRead: false, canWrite: false, error: 'not connected' };
    }
    try {
      await this.client.ping();
      return { persistent: true, driver: 'redis', canRead: true, canWrite: true };
    } catch (err) {
      return {
        persistent: true,
        driver: 'redis',
        canRead: false,
        canWrite: false,
        error: err instanceof Error ? err.message : (this.lastError ?? String(err)),
      };
    }
  }

  async set(key: string, value: string, options?: SetOptions): Promise<void> {
    assertContextKey(key);
    const ttlMs = resolveTtl(options, this.options.defaultTtlMs);
    const client = this.requireClient();
    await this.run('set', () =>
      ttlMs === undefined ? client.set(this.fullKey(key), value) : client.set(this.fullKey(key), value, { PX: ttlMs })
    );
  }

  async get(key: string): Promise<ContextLookup> {
    const client = this.requireClient();
    const value = await this.run('get', () => client.get(this.fullKey(key)));
    return value === null ? { status: 'missing' } : { status: 'found', value };
  }

  async require(key: string): Promise<string> {
    const result = await this.get(key);
    if (result.status !== 'found') {
      throw new ContextNotFoundError(key);
    }
    return result.value;
  }

  async delete(key: string): Promise<boolean> {
    const client = this.requireClient();
    const removed = await this.run('del', () => client.del(this.fullKey(key)));
    return removed > 0;
  }

  async keys(): Promise<string[]> {
    const client = this.requireClient();
    const keys = await this.run('keys', () => client.keys(`${this.options.keyPrefix}*`));
    return keys.map((key) => key.slice(this.options.keyPrefix.length)).sort();
  }

  async clear(): Promise<void> {
    const client = this.requireClient();
    const keys = await this.run('keys', () => client.keys(`${this.options.keyPrefix}*`));
    if (keys.length > 0) {
      await this.run('del', () => client.del(keys));
    }
  }

  async close(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
    }
  }

  private fullKey(key: string): string {
    return `${this.options.keyPrefix}${key}`;
  }

  private requireClient(): RedisClient {
    if (!this.client) {
      throw new ContextStoreError('Redis context store is not initialized (call init() first)');
    }
    return this.client;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new ContextStoreError(`${operation} failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
