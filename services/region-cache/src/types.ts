export type RegionName = string;
export type CacheId = string | number;
export type Generation = number;

/** Per-region behaviour; every duration is milliseconds. */
export interface RegionSettings {
  expirationMs: number;
  lockLeaseMs: number;
  lockTimeoutMs: number;
  lockRetryMs: number;
  maxGenerationRetries: number;
}
