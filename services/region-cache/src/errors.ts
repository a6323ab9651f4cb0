/** Base class for every error raised by the region cache. */
export class RegionCacheError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The remote store could not be reached or did not answer in time. */
export class StoreUnavailableError extends RegionCacheError {
  constructor(
    readonly operation: string,
    cause?: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause ?? 'unknown');
    super(`store ${operation} failed: ${detail}`, { cause });
  }
}

/** The region generation kept moving for longer than the retry budget allows. */
export class GenerationConflictError extends RegionCacheError {
  constructor(
    readonly region: string,
    readonly attempts: number,
  ) {
    super(`generation of region "${region}" did not settle after ${attempts} attempts`);
  }
}

/** The generation counter holds something other than a positive integer. */
export class CorruptGenerationError extends RegionCacheError {
  constructor(
    readonly key: string,
    readonly raw: string,
  ) {
    super(`corrupt generation at ${key}: ${raw}`);
  }
}

/** A lock could not be acquired before its acquisition timeout elapsed. */
export class LockTimeoutError extends RegionCacheError {
  constructor(
    readonly key: string,
    readonly timeoutMs: number,
  ) {
    super(`lock "${key}" not acquired within ${timeoutMs}ms`);
  }
}

/** A stored payload could not be encoded or decoded. */
export class CacheSerializationError extends RegionCacheError {}

/**
 * Failures the cache treats as "backend degraded": callers see a miss or a
 * no-op instead of an exception.
 */
export type DegradedError = StoreUnavailableError | GenerationConflictError | CorruptGenerationError;

export function isDegradedError(err: unknown): err is DegradedError {
  return (
    err instanceof StoreUnavailableError ||
    err instanceof GenerationConflictError ||
    err instanceof CorruptGenerationError
  );
}
