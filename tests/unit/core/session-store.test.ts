import { describe, it, expect, afterEach } from 'vitest';
import { InMemorySessionStore } from '../../../src/core/session-store.js';

describe('InMemorySessionStore', () => {
  let now = 1_000_000;
  const clock = () => now;
  let store: InMemorySessionStore<string>;

  afterEach(() => {
    store.destroy();
  });

  it('should return stored values until they expire', async () => {
    store = new InMemorySessionStore({ now: clock, cleanupIntervalMs: 0 });
    await store.put('s1', 'value', 1000);

    expect(await store.get('s1')).toBe('value');
    now += 999;
    expect(await store.get('s1')).toBe('value');
    now += 1;
    expect(await store.get('s1')).toBeUndefined();
  });

  it('should delete idempotently', async () => {
    store = new InMemorySessionStore({ now: clock, cleanupIntervalMs: 0 });
    await store.put('s1', 'value', 1000);
    await store.delete('s1');
    await store.delete('s1');
    expect(await store.get('s1')).toBeUndefined();
  });

  it('should take a matching entry exactly once', async () => {
    store = new InMemorySessionStore({ now: clock, cleanupIntervalMs: 0 });
    await store.put('s1', 'pending', 1000);

    const results = await Promise.all([
      store.take('s1', (state) => state === 'pending'),
      store.take('s1', (state) => state === 'pending'),
    ]);

    expect(results.filter((r) => r === 'pending')).toHaveLength(1);
    expect(results.filter((r) => r === undefined)).toHaveLength(1);
    expect(await store.get('s1')).toBeUndefined();
  });

  it('should leave the entry in place when the predicate fails', async () => {
    store = new InMemorySessionStore({ now: clock, cleanupIntervalMs: 0 });
    await store.put('s1', 'authenticated', 1000);

    expect(await store.take('s1', (state) => state === 'pending')).toBeUndefined();
    expect(await store.get('s1')).toBe('authenticated');
  });

  it('should not take expired entries', async () => {
    store = new InMemorySessionStore({ now: clock, cleanupIntervalMs: 0 });
    await store.put('s1', 'pending', 10);
    now += 10;
    expect(await store.take('s1', () => true)).toBeUndefined();
  });

  it('should list live states and sweep expired ones', async () => {
    store = new InMemorySessionStore({ now: clock, cleanupIntervalMs: 0 });
    await store.put('a', 'short', 10);
    await store.put('b', 'long', 1000);
    now += 20;

    expect(store.liveStates()).toEqual(['long']);
    await store.put('c', 'short', 10);
    now += 20;
    expect(store.cleanupExpired()).toBe(1);
  });
});
