import type Redis from 'ioredis';
import type { RemoteStore } from '../contracts/remoteStore';
import { StoreUnavailableError } from '../errors';

// KEYS[1] = key, ARGV[1] = expected value
const DELETE_IF_EQUALS = `
if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('del', KEYS[1])
end
return 0
`;

/** The slice of the ioredis client the store talks to. */
export type RedisCommands = Pick<Redis, 'get' | 'set' | 'del' | 'eval' | 'incrby' | 'pttl' | 'ping'>;

/**
 * `RemoteStore` over ioredis. Every rejected command is reported as
 * `StoreUnavailableError` with the driver error as its cause.
 */
export class RedisRemoteStore implements RemoteStore {
  constructor(private readonly redis: RedisCommands) {}

  async get(key: string): Promise<string | null> {
    return this.call('get', () => this.redis.get(key));
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    await this.call('set', () => this.redis.set(key, value, 'PX', ttlMs));
  }

  async setIfAbsent(key: string, value: string, ttlMs?: number): Promise<boolean> {
    const res = await this.call('setIfAbsent', () =>
      ttlMs && ttlMs > 0 ? this.redis.set(key, value, 'PX', ttlMs, 'NX') : this.redis.set(key, value, 'NX'),
    );
    return res === 'OK';
  }

  async delete(key: string): Promise<void> {
    await this.call('delete', () => this.redis.del(key));
  }

  async deleteIfEquals(key: string, expected: string): Promise<boolean> {
    const res = await this.call('deleteIfEquals', () => this.redis.eval(DELETE_IF_EQUALS, 1, key, expected));
    return res === 1;
  }

  async increment(key: string, delta: number): Promise<number> {
    return this.call('increment', () => this.redis.incrby(key, delta));
  }

  async ttl(key: string): Promise<number | null> {
    const ttl = await this.call('ttl', () => this.redis.pttl(key));
    if (ttl === -2) return null; // missing
    if (ttl === -1) return null; // no ttl set
    return ttl;
  }

  async ping(): Promise<void> {
    await this.call('ping', () => this.redis.ping());
  }

  private async call<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      throw new StoreUnavailableError(operation, err);
    }
  }
}
