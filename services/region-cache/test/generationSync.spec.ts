import { describe, expect, it } from 'vitest';
import { GenerationSynchronizer } from '../src/cache/generationSync';
import { CacheNamespace } from '../src/cache/namespace';
import { GenerationConflictError } from '../src/errors';
import { InMemoryRemoteStore } from '../src/storage/memoryRemoteStore';

function setup(maxAttempts = 16) {
  const store = new InMemoryRemoteStore();
  const namespace = new CacheNamespace('region', store);
  const sync = new GenerationSynchronizer(namespace, maxAttempts);
  return { store, namespace, sync };
}

describe('GenerationSynchronizer', () => {
  it('bootstraps the generation and runs once when nothing moves', async () => {
    const { namespace, sync } = setup();
    const seen: number[] = [];

    const result = await sync.run(async (generation) => {
      seen.push(generation);
      return 'done';
    });

    expect(result).toBe('done');
    expect(seen).toEqual([1]);
    expect(namespace.localGeneration).toBe(1);
  });

  it('repeats the operation under the generation another client moved to', async () => {
    const { store, namespace, sync } = setup();
    const seen: number[] = [];

    await sync.run(async (generation) => {
      seen.push(generation);
      if (seen.length === 1) await store.increment(namespace.generationKey(), 1);
    });

    expect(seen).toEqual([1, 2]);
    expect(namespace.localGeneration).toBe(2);
  });

  it('starts from the locally known generation', async () => {
    const { store, namespace, sync } = setup();
    await namespace.ensureGeneration();
    await store.increment(namespace.generationKey(), 100);
    const seen: number[] = [];

    await sync.run(async (generation) => {
      seen.push(generation);
    });

    expect(seen).toEqual([1, 101]);
    expect(namespace.localGeneration).toBe(101);
  });

  it('gives up once the attempt budget is spent', async () => {
    const { store, namespace, sync } = setup(3);
    let calls = 0;

    const run = sync.run(async () => {
      calls++;
      await store.increment(namespace.generationKey(), 1);
    });

    await expect(run).rejects.toBeInstanceOf(GenerationConflictError);
    expect(calls).toBe(3);
  });

  it('follows the generation back to 1 after the store was flushed', async () => {
    const { store, namespace, sync } = setup();
    await store.increment(namespace.generationKey(), 5);
    await namespace.currentGeneration();
    const seen: number[] = [];

    await sync.run(async (generation) => {
      seen.push(generation);
      if (seen.length === 1) store.flush();
    });

    expect(seen).toEqual([5, 1]);
    expect(namespace.localGeneration).toBe(1);
    expect(await store.get(namespace.generationKey())).toBe('1');
  });
});
