/**
 * Atomic primitives the region cache needs from the shared key/value store.
 * Durations are milliseconds. Implementations raise `StoreUnavailableError`
 * when the backend cannot be reached.
 */
export interface RemoteStore {
  get(key: string): Promise<string | null>;
  /** Overwrites `key` and (re)sets its expiry. */
  set(key: string, value: string, ttlMs: number): Promise<void>;
  /** Creates `key` only if absent. Resolves `true` iff this call created it. */
  setIfAbsent(key: string, value: string, ttlMs?: number): Promise<boolean>;
  delete(key: string): Promise<void>;
  /** Deletes `key` only while it still holds `expected`. */
  deleteIfEquals(key: string, expected: string): Promise<boolean>;
  /** Adds `delta`, creating the key at `delta` when absent. */
  increment(key: string, delta: number): Promise<number>;
  /** Remaining time to live, or `null` when the key is missing or never expires. */
  ttl(key: string): Promise<number | null>;
  ping(): Promise<void>;
}
