import Redis from 'ioredis';
import { config } from '../config';

let client: Redis | null = null;

export function createRedis(url: string = config.redisUrl): Redis {
  return new Redis(url, {
    lazyConnect: false,
    // fail fast: an unreachable store must surface as an error, not a stalled call
    maxRetriesPerRequest: 1,
    commandTimeout: config.redisCommandTimeoutMs,
    enableReadyCheck: true,
  });
}

export function getRedis(): Redis {
  if (!client) {
    client = createRedis();
  }
  return client;
}

export async function closeRedis(): Promise<void> {
  if (!client) return;
  const current = client;
  client = null;
  await current.quit();
}
