import { RegionCache } from './cache/regionCache';
import { DEFAULT_KEY_PREFIX } from './cache/namespace';
import { resolveRegionSettings, type RegionOverrides } from './config';
import type { CacheSerializer } from './contracts/serializer';
import type { RemoteStore } from './contracts/remoteStore';
import { logger } from './observability/logger';
import { untypedJsonSerializer } from './serialization/json';
import type { RegionName, RegionSettings } from './types';

export interface RegionCacheProviderOptions {
  store: RemoteStore;
  defaults: RegionSettings;
  overrides?: RegionOverrides;
  keyPrefix?: string;
  /** Upper bound on the regions `regionCache` keeps open; the least recently opened is dropped first. */
  maxRegions?: number;
}

const DEFAULT_MAX_REGIONS = 1024;

/**
 * Builds region caches that share one store connection and one set of
 * defaults. Each cache keeps its own view of the region generation, so two
 * providers in one process behave like two independent clients.
 */
export class RegionCacheProvider {
  readonly store: RemoteStore;
  private readonly defaults: RegionSettings;
  private readonly overrides: RegionOverrides;
  private readonly keyPrefix: string;
  private readonly maxRegions: number;
  private readonly open = new Map<RegionName, Promise<RegionCache<unknown>>>();
  private readonly log = logger.child({ component: 'region-cache-provider' });

  constructor(options: RegionCacheProviderOptions) {
    this.store = options.store;
    this.defaults = options.defaults;
    this.overrides = options.overrides ?? {};
    this.keyPrefix = options.keyPrefix ?? DEFAULT_KEY_PREFIX;
    this.maxRegions = options.maxRegions ?? DEFAULT_MAX_REGIONS;
  }

  settingsFor(region: RegionName): RegionSettings {
    return resolveRegionSettings(region, this.defaults, this.overrides);
  }

  /** Returns a cache for `region` whose generation has been bootstrapped if the store is reachable. */
  async buildCache(region: RegionName): Promise<RegionCache<unknown>>;
  async buildCache<V>(region: RegionName, serializer: CacheSerializer<V>): Promise<RegionCache<V>>;
  async buildCache(
    region: RegionName,
    serializer: CacheSerializer<unknown> = untypedJsonSerializer(),
  ): Promise<RegionCache<unknown>> {
    const settings = this.settingsFor(region);
    const cache = new RegionCache(region, {
      store: this.store,
      serializer,
      settings,
      keyPrefix: this.keyPrefix,
    });
    await cache.initialize();
    this.log.debug({ region, expirationMs: settings.expirationMs }, 'Region cache built');
    return cache;
  }

  /**
   * Shared cache for `region`, built on first use. A build that fails is
   * forgotten so the next call tries again.
   */
  regionCache(region: RegionName): Promise<RegionCache<unknown>> {
    const existing = this.open.get(region);
    if (existing) return existing;

    if (this.open.size >= this.maxRegions) {
      const oldest = this.open.keys().next();
      if (!oldest.done) this.open.delete(oldest.value);
    }
    const pending = this.buildCache(region);
    this.open.set(region, pending);
    pending.catch(() => {
      if (this.open.get(region) === pending) this.open.delete(region);
    });
    return pending;
  }

  /** Destroys every cache opened through `regionCache`. */
  async stop(): Promise<void> {
    const settled = await Promise.allSettled(this.open.values());
    this.open.clear();
    for (const result of settled) {
      if (result.status === 'fulfilled') result.value.destroy();
    }
  }
}
