import { z } from 'zod';
import type { RemoteStore } from '../src/contracts/remoteStore';
import { StoreUnavailableError } from '../src/errors';
import type { RegionSettings } from '../src/types';

export const personSchema = z.object({ Name: z.string(), Age: z.number() });
export type Person = z.infer<typeof personSchema>;

export const FIVE_MINUTES = 5 * 60_000;

export const testSettings: RegionSettings = {
  expirationMs: FIVE_MINUTES,
  lockLeaseMs: 5_000,
  lockTimeoutMs: 5_000,
  lockRetryMs: 5,
  maxGenerationRetries: 16,
};

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** A store whose backend is gone: every call fails like a refused connection. */
export class UnreachableStore implements RemoteStore {
  private fail(operation: string): Promise<never> {
    return Promise.reject(new StoreUnavailableError(operation, new Error('connect ECONNREFUSED')));
  }

  get() {
    return this.fail('get');
  }
  set() {
    return this.fail('set');
  }
  setIfAbsent() {
    return this.fail('setIfAbsent');
  }
  delete() {
    return this.fail('delete');
  }
  deleteIfEquals() {
    return this.fail('deleteIfEquals');
  }
  increment() {
    return this.fail('increment');
  }
  ttl() {
    return this.fail('ttl');
  }
  ping() {
    return this.fail('ping');
  }
}
