import { randomUUID } from 'crypto';
import { setTimeout as sleep } from 'timers/promises';
import type { RemoteStore } from '../contracts/remoteStore';
import { LockTimeoutError } from '../errors';

export interface LockOptions {
  /** Lifetime of the lock entry; bounds how long a crashed holder blocks others. */
  leaseMs: number;
  /** How long `acquire` keeps trying. `0` makes a single attempt. */
  timeoutMs: number;
  retryMs: number;
}

export interface LockLease {
  key: string;
  token: string;
  expiresAt: number;
}

/**
 * Mutual exclusion over a single store key: the holder is whoever managed to
 * create the key, and the value is a token unique to that acquisition.
 */
export class DistributedLock {
  constructor(
    private readonly store: RemoteStore,
    private readonly now: () => number = Date.now,
  ) {}

  /** Waits until `key` is free and takes it, or throws `LockTimeoutError`. */
  async acquire(key: string, options: LockOptions): Promise<LockLease> {
    const token = randomUUID();
    const deadline = this.now() + options.timeoutMs;

    for (;;) {
      const startedAt = this.now();
      if (await this.store.setIfAbsent(key, token, options.leaseMs)) {
        return { key, token, expiresAt: startedAt + options.leaseMs };
      }
      const remaining = deadline - this.now();
      if (remaining <= 0) {
        throw new LockTimeoutError(key, options.timeoutMs);
      }
      await sleep(Math.min(options.retryMs, remaining));
    }
  }

  /**
   * Drops the lock if `lease` still owns it. Returns false when the lease had
   * already expired or been taken over by another holder.
   */
  async release(lease: Pick<LockLease, 'key' | 'token'>): Promise<boolean> {
    return this.store.deleteIfEquals(lease.key, lease.token);
  }
}
