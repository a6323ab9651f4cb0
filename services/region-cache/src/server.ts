import Fastify from 'fastify';
import { registerRegionRoutes } from './routes/region';
import type { RegionCacheProvider } from './provider';

export interface BuildAppOptions {
  provider: RegionCacheProvider;
}

export async function buildApp({ provider }: BuildAppOptions) {
  const app = Fastify({ logger: false });

  app.get('/health', async () => {
    try {
      await provider.store.ping();
      return { status: 'ok', store: 'ok' };
    } catch {
      return { status: 'degraded', store: 'error' };
    }
  });

  await registerRegionRoutes(app, provider);
  app.addHook('onClose', async () => {
    await provider.stop();
  });
  return app;
}
