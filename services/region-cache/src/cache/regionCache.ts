import type { CacheSerializer } from '../contracts/serializer';
import type { RemoteStore } from '../contracts/remoteStore';
import { isDegradedError, type DegradedError } from '../errors';
import { logger, type Logger } from '../observability/logger';
import type { CacheId, Generation, RegionName, RegionSettings } from '../types';
import { DistributedLock, type LockLease } from './distributedLock';
import { GenerationSynchronizer } from './generationSync';
import { CacheNamespace } from './namespace';

/** Result of a store interaction once degraded-backend failures have been absorbed. */
export type Outcome<T> = { ok: true; value: T } | { ok: false; error: DegradedError };

export interface RegionCacheOptions<V> {
  store: RemoteStore;
  serializer: CacheSerializer<V>;
  settings: RegionSettings;
  keyPrefix?: string;
  log?: Logger;
}

/**
 * One named region of the shared cache.
 *
 * Item operations go through the generation synchronizer so that a `clear()`
 * issued by any client is observed here without coordination. The cache is
 * best-effort: when the store is unreachable, writes become no-ops and reads
 * become misses. Lock timeouts and serialization failures still reach the
 * caller.
 */
export class RegionCache<V> {
  readonly namespace: CacheNamespace;
  readonly settings: RegionSettings;

  private readonly store: RemoteStore;
  private readonly serializer: CacheSerializer<V>;
  private readonly sync: GenerationSynchronizer;
  private readonly locks: DistributedLock;
  private readonly held = new Map<string, LockLease>();
  private readonly log: Logger;

  constructor(
    readonly region: RegionName,
    options: RegionCacheOptions<V>,
  ) {
    this.store = options.store;
    this.serializer = options.serializer;
    this.settings = options.settings;
    this.log = options.log ?? logger.child({ component: 'region-cache', region });
    this.namespace = new CacheNamespace(region, options.store, options.keyPrefix);
    this.sync = new GenerationSynchronizer(this.namespace, options.settings.maxGenerationRetries, this.log);
    this.locks = new DistributedLock(options.store);
  }

  /** Generation this client last observed for the region. */
  get generation(): Generation | null {
    return this.namespace.localGeneration;
  }

  /** Bootstraps the region generation. Safe to skip: the first operation does it lazily. */
  async initialize(): Promise<void> {
    await this.guard('initialize', undefined, () => this.namespace.ensureGeneration());
  }

  async put(id: CacheId, value: V): Promise<void> {
    const payload = this.serializer.serialize(value);
    const { expirationMs } = this.settings;

    await this.guard('put', id, () =>
      this.sync.run(async (generation) => {
        await this.store.set(this.namespace.itemKey(id, generation), payload, expirationMs);
        await this.store.set(this.namespace.registryKey(), String(generation), expirationMs);
      }),
    );
  }

  async get(id: CacheId): Promise<V | null> {
    const outcome = await this.guard('get', id, () =>
      this.sync.run((generation) => this.store.get(this.namespace.itemKey(id, generation))),
    );
    if (!outcome.ok || outcome.value === null) return null;
    return this.serializer.deserialize(outcome.value);
  }

  async remove(id: CacheId): Promise<void> {
    await this.guard('remove', id, () =>
      this.sync.run((generation) => this.store.delete(this.namespace.itemKey(id, generation))),
    );
  }

  /**
   * Moves the region to a new generation. Existing items are left in place
   * and simply become unreachable until their TTL runs out. Resolves the new
   * generation, or `null` when the store could not be updated.
   */
  async clear(): Promise<Generation | null> {
    const outcome = await this.guard('clear', undefined, async () => {
      const generation = await this.namespace.advanceGeneration();
      await this.store.delete(this.namespace.registryKey());
      return generation;
    });
    if (!outcome.ok) return null;
    this.log.info({ generation: outcome.value }, 'Region cleared');
    return outcome.value;
  }

  /**
   * Blocks until this client holds the lock on `id`. Resolves `null` when the
   * store is unreachable; throws `LockTimeoutError` once `lockTimeoutMs` is spent.
   * Lock keys do not carry the generation, so a held lock survives a clear.
   */
  async lock(id: CacheId): Promise<LockLease | null> {
    const key = this.namespace.lockKey(id);
    const outcome = await this.guard('lock', id, () =>
      this.locks.acquire(key, {
        leaseMs: this.settings.lockLeaseMs,
        timeoutMs: this.settings.lockTimeoutMs,
        retryMs: this.settings.lockRetryMs,
      }),
    );
    if (!outcome.ok) return null;
    this.held.set(key, outcome.value);
    return outcome.value;
  }

  /**
   * Releases the lock on `id` held through this instance, or the given lease.
   * Unlocking something this client does not hold does nothing.
   */
  async unlock(id: CacheId, lease?: LockLease): Promise<void> {
    const key = this.namespace.lockKey(id);
    const target = lease ?? this.held.get(key);
    if (!target) return;
    if (this.held.get(key)?.token === target.token) {
      this.held.delete(key);
    }

    const outcome = await this.guard('unlock', id, () => this.locks.release(target));
    if (outcome.ok && !outcome.value) {
      this.log.warn({ id }, 'Lock lease expired before unlock');
    }
  }

  /** Drops local state only; the region's generation and items are untouched. */
  destroy(): void {
    this.held.clear();
    this.namespace.reset();
  }

  private async guard<T>(operation: string, id: CacheId | undefined, run: () => Promise<T>): Promise<Outcome<T>> {
    try {
      return { ok: true, value: await run() };
    } catch (err) {
      if (!isDegradedError(err)) throw err;
      this.log.warn({ err, operation, id }, 'Cache backend degraded; continuing without it');
      return { ok: false, error: err };
    }
  }
}
