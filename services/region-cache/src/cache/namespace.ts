import type { RemoteStore } from '../contracts/remoteStore';
import { CorruptGenerationError, RegionCacheError } from '../errors';
import type { CacheId, Generation, RegionName } from '../types';

export const DEFAULT_KEY_PREFIX = 'region-cache:';

const INITIAL_GENERATION: Generation = 1;

/**
 * Physical key layout of one region, plus this client's view of the
 * region's generation.
 *
 * Keys are `<prefix><region>:generation`, `<prefix><region>:keys`,
 * `<prefix><region>:lock:<id>` and `<prefix><region>:<generation>:<id>`.
 * The region segment is URI-encoded so it never contains `:`, which keeps
 * keys of different regions and generations apart.
 */
export class CacheNamespace {
  private generation: Generation | null = null;
  private readonly base: string;

  constructor(
    readonly region: RegionName,
    private readonly store: RemoteStore,
    readonly prefix: string = DEFAULT_KEY_PREFIX,
  ) {
    if (!region) throw new RegionCacheError('region name required');
    this.base = `${prefix}${encodeURIComponent(region)}`;
  }

  /** Last generation this client observed, `null` before the first store round-trip. */
  get localGeneration(): Generation | null {
    return this.generation;
  }

  generationKey(): string {
    return `${this.base}:generation`;
  }

  registryKey(): string {
    return `${this.base}:keys`;
  }

  lockKey(id: CacheId): string {
    return `${this.base}:lock:${id}`;
  }

  itemKey(id: CacheId, generation: Generation): string {
    return `${this.base}:${generation}:${id}`;
  }

  /** Item key under the locally known generation. */
  currentItemKey(id: CacheId): string {
    return this.itemKey(id, this.generation ?? INITIAL_GENERATION);
  }

  /** Creates the generation key at 1 unless another client already did, then reads it. */
  async ensureGeneration(): Promise<Generation> {
    const key = this.generationKey();
    for (;;) {
      if (await this.store.setIfAbsent(key, String(INITIAL_GENERATION))) {
        return this.adopt(INITIAL_GENERATION);
      }
      const raw = await this.store.get(key);
      // flushed between the two calls: bootstrap again
      if (raw !== null) return this.adopt(parseGeneration(key, raw));
    }
  }

  async currentGeneration(): Promise<Generation> {
    const key = this.generationKey();
    const raw = await this.store.get(key);
    if (raw === null) return this.ensureGeneration();
    return this.adopt(parseGeneration(key, raw));
  }

  /**
   * Moves the region one past its current generation. A missing counter is
   * bootstrapped first, so the first clear of a region always lands on 2.
   */
  async advanceGeneration(): Promise<Generation> {
    const key = this.generationKey();
    await this.store.setIfAbsent(key, String(INITIAL_GENERATION));
    return this.adopt(await this.store.increment(key, 1));
  }

  /** Forgets the local generation; the next operation bootstraps it again. */
  reset(): void {
    this.generation = null;
  }

  private adopt(generation: Generation): Generation {
    this.generation = generation;
    return generation;
  }
}

function parseGeneration(key: string, raw: string): Generation {
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < INITIAL_GENERATION) {
    throw new CorruptGenerationError(key, raw);
  }
  return value;
}
