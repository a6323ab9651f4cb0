import { describe, expect, it } from 'vitest';
import { CacheNamespace } from '../src/cache/namespace';
import { CorruptGenerationError, RegionCacheError } from '../src/errors';
import { InMemoryRemoteStore } from '../src/storage/memoryRemoteStore';

describe('CacheNamespace', () => {
  it('derives keys from the prefix and region name', () => {
    const ns = new CacheNamespace('regionName', new InMemoryRemoteStore());
    expect(ns.generationKey()).toBe('region-cache:regionName:generation');
    expect(ns.registryKey()).toBe('region-cache:regionName:keys');
    expect(ns.lockKey(7)).toBe('region-cache:regionName:lock:7');
    expect(ns.itemKey(999, 3)).toBe('region-cache:regionName:3:999');
  });

  it('keeps keys of different regions and generations apart', () => {
    const store = new InMemoryRemoteStore();
    const plain = new CacheNamespace('a', store);
    const colon = new CacheNamespace('a:1', store);

    expect(colon.itemKey('x', 2)).toBe('region-cache:a%3A1:2:x');
    expect(plain.itemKey('2:x', 1)).toBe('region-cache:a:1:2:x');
    expect(plain.itemKey('x', 1)).not.toBe(plain.itemKey('x', 2));
  });

  it('rejects an empty region name', () => {
    expect(() => new CacheNamespace('', new InMemoryRemoteStore())).toThrow(RegionCacheError);
  });

  it('bootstraps the generation at 1', async () => {
    const store = new InMemoryRemoteStore();
    const ns = new CacheNamespace('region', store);

    expect(ns.localGeneration).toBeNull();
    expect(await ns.ensureGeneration()).toBe(1);
    expect(ns.localGeneration).toBe(1);
    expect(await store.get(ns.generationKey())).toBe('1');
  });

  it('converges on one generation under concurrent first use', async () => {
    const store = new InMemoryRemoteStore();
    const clients = Array.from({ length: 10 }, () => new CacheNamespace('region', store));

    const generations = await Promise.all(clients.map((ns) => ns.ensureGeneration()));

    expect(generations).toEqual(Array(10).fill(1));
    expect(await store.get('region-cache:region:generation')).toBe('1');
  });

  it('picks up a generation advanced by another client', async () => {
    const store = new InMemoryRemoteStore();
    const ns = new CacheNamespace('region', store);
    await ns.ensureGeneration();

    await store.increment(ns.generationKey(), 100);

    expect(ns.localGeneration).toBe(1);
    expect(await ns.currentGeneration()).toBe(101);
    expect(ns.localGeneration).toBe(101);
  });

  it('advances the generation by one', async () => {
    const store = new InMemoryRemoteStore();
    const ns = new CacheNamespace('region', store);
    await ns.ensureGeneration();

    expect(await ns.advanceGeneration()).toBe(2);
    expect(await store.get(ns.generationKey())).toBe('2');
  });

  it('advances a missing generation past the bootstrap value', async () => {
    const store = new InMemoryRemoteStore();
    const ns = new CacheNamespace('region', store);

    expect(await ns.advanceGeneration()).toBe(2);
    expect(ns.localGeneration).toBe(2);
  });

  it('re-bootstraps after the store lost its data', async () => {
    const store = new InMemoryRemoteStore();
    const ns = new CacheNamespace('region', store);
    await store.increment(ns.generationKey(), 5);
    expect(await ns.currentGeneration()).toBe(5);

    store.flush();

    expect(await ns.currentGeneration()).toBe(1);
    expect(await store.get(ns.generationKey())).toBe('1');
  });

  it('refuses a corrupt generation value', async () => {
    const store = new InMemoryRemoteStore();
    const ns = new CacheNamespace('region', store);
    await store.set(ns.generationKey(), 'zero', 1_000);

    await expect(ns.currentGeneration()).rejects.toThrow('corrupt generation at region-cache:region:generation: zero');
    await expect(ns.currentGeneration()).rejects.toBeInstanceOf(CorruptGenerationError);
  });

  it('reset forgets the local generation only', async () => {
    const store = new InMemoryRemoteStore();
    const ns = new CacheNamespace('region', store);
    await ns.ensureGeneration();

    ns.reset();

    expect(ns.localGeneration).toBeNull();
    expect(await store.get(ns.generationKey())).toBe('1');
  });
});
