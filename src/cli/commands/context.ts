import type { ContextStore } from '../../storage/adapter.js';

export interface ContextSetOptions {
  ttl?: string;
}

export async function runContextSet(
  store: ContextStore,
  key: string,
  value: string,
  options: ContextSetOptions
): Promise<void> {
  const ttlMs = options.ttl === undefined ? undefined : Number(options.ttl);
  await store.set(key, value, { ttlMs });
  console.log(ttlMs === undefined ? `Stored ${key}` : `Stored ${key} (expires in ${ttlMs}ms)`);
}

export async function runContextGet(store: ContextStore, key: string): Promise<void> {
  console.log(await store.require(key));
}

export async function runContextDelete(store: ContextStore, key: string): Promise<void> {
  const removed = await store.delete(key);
  console.log(removed ? `Deleted ${key}` : `No live reference ${key}`);
}

export async function runContextKeys(store: ContextStore): Promise<void> {
  for (const key of await store.keys()) {
    console.log(key);
  }
}

export async function runContextHealth(store: ContextStore): Promise<void> {
  const health = await store.healthCheck();
  const ok = health.canRead && health.canWrite;
  console.log(`Driver:     ${health.driver}`);
  console.log(`Persistent: ${health.persistent ? 'yes' : 'no'}`);
  console.log(`Status:     ${ok ? 'ok' : 'unavailable'}`);
  if (health.error) {
    console.log(`Error:      ${health.error}`);
  }
  if (!ok) {
    process.exitCode = 1;
  }
}
