import 'dotenv/config';
import { z } from 'zod';
import type { RegionName, RegionSettings } from './types';

const DEFAULT_KEY_PREFIX = 'region-cache:';

const int = (name: string, fallback: number) => parseInt(process.env[name] || String(fallback), 10);

export const regionSettingsSchema = z.object({
  expirationMs: z.number().int().positive(),
  lockLeaseMs: z.number().int().positive(),
  lockTimeoutMs: z.number().int().nonnegative(),
  lockRetryMs: z.number().int().positive(),
  maxGenerationRetries: z.number().int().positive(),
});

export const regionOverridesSchema = z.record(regionSettingsSchema.partial());

export type RegionOverrides = z.infer<typeof regionOverridesSchema>;

export const config = {
  port: parseInt(process.env.PORT || '8080', 10),
  host: process.env.HOST || '0.0.0.0',
  store: process.env.CACHE_STORE === 'memory' ? ('memory' as const) : ('redis' as const),
  redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
  redisCommandTimeoutMs: int('REDIS_COMMAND_TIMEOUT_MS', 2000),
  keyPrefix: process.env.CACHE_KEY_PREFIX || DEFAULT_KEY_PREFIX,
  maxRegions: int('MAX_REGIONS', 1024),
  region: {
    expirationMs: int('REGION_EXPIRATION_S', 300) * 1000,
    lockLeaseMs: int('LOCK_LEASE_MS', 30_000),
    lockTimeoutMs: int('LOCK_TIMEOUT_MS', 10_000),
    lockRetryMs: int('LOCK_RETRY_MS', 25),
    maxGenerationRetries: int('GENERATION_MAX_RETRIES', 16),
  } satisfies RegionSettings,
  overrides: parseOverrides(process.env.REGION_OVERRIDES),
};

/** Parses the `REGION_OVERRIDES` JSON object; an unset variable means no overrides. */
export function parseOverrides(raw: string | undefined): RegionOverrides {
  if (!raw) return {};
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (err) {
    throw new Error('REGION_OVERRIDES must be a JSON object', { cause: err });
  }
  return regionOverridesSchema.parse(decoded);
}

/** Layers a region's overrides on top of the defaults and validates the result. */
export function resolveRegionSettings(
  region: RegionName,
  defaults: RegionSettings,
  overrides: RegionOverrides = {},
): RegionSettings {
  return regionSettingsSchema.parse({ ...defaults, ...overrides[region] });
}
