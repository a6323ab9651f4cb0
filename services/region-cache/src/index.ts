import { config } from './config';
import type { RemoteStore } from './contracts/remoteStore';
import { logger } from './observability/logger';
import { RegionCacheProvider } from './provider';
import { closeRedis, getRedis } from './redis/client';
import { RedisRemoteStore } from './redis/kv';
import { buildApp } from './server';
import { InMemoryRemoteStore } from './storage/memoryRemoteStore';

/**
 * Main entrypoint for the region cache service.
 * Wires the configured store into a provider, registers routes and listens on host/port.
 */
async function main() {
  const store: RemoteStore = config.store === 'memory' ? new InMemoryRemoteStore() : new RedisRemoteStore(getRedis());
  const provider = new RegionCacheProvider({
    store,
    defaults: config.region,
    overrides: config.overrides,
    keyPrefix: config.keyPrefix,
    maxRegions: config.maxRegions,
  });

  const app = await buildApp({ provider });
  app.addHook('onClose', async () => {
    if (config.store === 'redis') await closeRedis();
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
    logger.info({ store: config.store }, `Region cache listening on http://${config.host}:${config.port}`);
  } catch (err) {
    logger.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  logger.fatal({ err }, 'Fatal error starting region cache');
  process.exit(1);
});
