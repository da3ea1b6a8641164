import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MemoryContextStore, createContextStore } from './adapter.js';
import { ContextNotFoundError, ContextStoreError } from '../utils/errors.js';

describe('MemoryContextStore', () => {
  let now: number;
  let store: MemoryContextStore;

  beforeEach(async () => {
    now = 1_000;
    store = new MemoryContextStore({ clock: () => now });
    await store.init();
  });

  it('stores and resolves references', async () => {
    await store.set('ref#1', 'Project: network security monitoring');

    expect(await store.get('ref#1')).toEqual({ status: 'found', value: 'Project: network security monitoring' });
    expect(await store.require('ref#1')).toBe('Project: network security monitoring');
  });

  it('reports unknown references as missing', async () => {
    expect(await store.get('ref#404')).toEqual({ status: 'missing' });
    await expect(store.require('ref#404')).rejects.toThrow('Context reference not found: ref#404');
  });

  it('reports an expired entry once, then forgets it', async () => {
    await store.set('ref#1', 'short lived', { ttlMs: 500 });

    now = 1_499;
    expect((await store.get('ref#1')).status).toBe('found');

    now = 1_500;
    expect(await store.get('ref#1')).toEqual({ status: 'expired' });
    expect(await store.get('ref#1')).toEqual({ status: 'missing' });
  });

  it('throws an expiry error from require', async () => {
    await store.set('ref#1', 'x', { ttlMs: 10 });
    now = 2_000;
    const err = await store.require('ref#1').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ContextNotFoundError);
    expect(err).toMatchObject({ key: 'ref#1', message: 'Context reference expired: ref#1' });
  });

  it('applies the default ttl unless overridden', async () => {
    const withDefault = new MemoryContextStore({ defaultTtlMs: 100, clock: () => now });
    await withDefault.set('a', '1');
    await withDefault.set('b', '2', { ttlMs: 1_000 });

    now = 1_100;
    expect(await withDefault.keys()).toEqual(['b']);
  });

  it('overwrites an existing reference and resets its ttl', async () => {
    await store.set('ref#1', 'old', { ttlMs: 10 });
    await store.set('ref#1', 'new');
    now = 5_000;
    expect(await store.require('ref#1')).toBe('new');
  });

  it('lists live keys sorted', async () => {
    await store.set('ref#2', 'b');
    await store.set('ref#1', 'a');
    await store.set('ref#3', 'c', { ttlMs: 1 });
    now = 1_001;
    expect(await store.keys()).toEqual(['ref#1', 'ref#2']);
  });

  it('sweeps expired entries on set and keys', async () => {
    await store.set('ref#1', 'a', { ttlMs: 10 });
    await store.set('ref#2', 'b', { ttlMs: 10 });
    expect(store.size).toBe(2);

    now = 1_010;
    await store.set('ref#3', 'c', { ttlMs: 10 });
    expect(store.size).toBe(1);
    expect(await store.get('ref#1')).toEqual({ status: 'missing' });

    now = 1_020;
    expect(await store.keys()).toEqual([]);
    expect(store.size).toBe(0);
  });

  it('deletes and clears', async () => {
    await store.set('ref#1', 'a');
    await store.set('ref#2', 'b');

    expect(await store.delete('ref#1')).toBe(true);
    expect(await store.delete('ref#1')).toBe(false);

    await store.clear();
    expect(await store.keys()).toEqual([]);
  });

  it('rejects invalid keys and ttls', async () => {
    await expect(store.set('', 'x')).rejects.toThrow(ContextStoreError);
    await expect(store.set('has space', 'x')).rejects.toThrow('invalid context key "has space"');
    await expect(store.set('ok', 'x', { ttlMs: 0 })).rejects.toThrow('ttlMs must be a positive integer, got 0');
  });

  it('reports non-persistent health', async () => {
    expect(await store.healthCheck()).toEqual({ persistent: false, driver: 'memory', canRead: true, canWrite: true });
  });
});

describe('createContextStore', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('defaults to memory', async () => {
    delete process.env.AGENTWIRE_CONTEXT_BACKEND;
    const store = await createContextStore();
    expect(store).toBeInstanceOf(MemoryContextStore);
    expect((await store.healthCheck()).driver).toBe('memory');
  });

  it('passes the default ttl to the memory store', async () => {
    const store = await createContextStore({ backend: 'memory', defaultTtlMs: 1 });
    await store.set('k', 'v');
    await new Promise((resolve) => setTimeout(resolve, 5));
    expect((await store.get('k')).status).toBe('expired');
  });

  it('requires a url for the redis backend', async () => {
    delete process.env.AGENTWIRE_REDIS_URL;
    await expect(createContextStore({ backend: 'redis' })).rejects.toThrow(ContextStoreError);
  });
});
