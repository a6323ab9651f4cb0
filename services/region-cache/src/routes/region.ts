import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import { LockTimeoutError, isDegradedError } from '../errors';
import type { RegionCacheProvider } from '../provider';
import type { RegionName } from '../types';

// ---------- Schemas ----------
const idSchema = z.union([z.string().min(1), z.number().int()]);

const regionSchema = z.object({
  region: z.string().min(1, 'region required'),
});

const itemSchema = regionSchema.extend({ id: idSchema });

const putSchema = itemSchema.extend({
  value: z.unknown().refine((v) => v !== undefined, 'value required'),
});

const getSchema = regionSchema.extend({ id: z.string().min(1) });

// ---------- Helper ----------
function badRequest(reply: FastifyReply, error: z.ZodError) {
  return reply.code(400).send({ error: error.flatten() });
}

// ---------- Routes ----------
export async function registerRegionRoutes(app: FastifyInstance, provider: RegionCacheProvider) {
  // the server is a single client: one cache per region, shared across requests
  const cacheFor = (region: RegionName) => provider.regionCache(region);

  app.post('/region.put', async (req, reply) => {
    const parsed = putSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const { region, id, value } = parsed.data;
    await (await cacheFor(region)).put(id, value);
    return reply.send({ ok: true });
  });

  app.get('/region.get', async (req, reply) => {
    const parsed = getSchema.safeParse(req.query);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const { region, id } = parsed.data;
    const value = await (await cacheFor(region)).get(id);
    if (value === null) return reply.code(404).send({ error: 'not_found' });
    return reply.send({ value });
  });

  app.delete('/region.remove', async (req, reply) => {
    const parsed = itemSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const { region, id } = parsed.data;
    await (await cacheFor(region)).remove(id);
    return reply.send({ ok: true });
  });

  app.post('/region.clear', async (req, reply) => {
    const parsed = regionSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const generation = await (await cacheFor(parsed.data.region)).clear();
    if (generation === null) {
      return reply.code(503).send({ error: 'store_unavailable' });
    }
    return reply.send({ ok: true, generation });
  });

  app.get('/region.generation', async (req, reply) => {
    const parsed = regionSchema.safeParse(req.query);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const cache = await cacheFor(parsed.data.region);
    try {
      return reply.send({ generation: await cache.namespace.currentGeneration() });
    } catch (err) {
      if (isDegradedError(err)) {
        return reply.code(503).send({ error: 'store_unavailable' });
      }
      throw err;
    }
  });

  app.post('/region.lock', async (req, reply) => {
    const parsed = itemSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const { region, id } = parsed.data;
    try {
      await (await cacheFor(region)).lock(id);
    } catch (err) {
      if (err instanceof LockTimeoutError) {
        return reply.code(409).send({ error: 'lock_timeout' });
      }
      throw err;
    }
    return reply.send({ ok: true });
  });

  app.post('/region.unlock', async (req, reply) => {
    const parsed = itemSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const { region, id } = parsed.data;
    await (await cacheFor(region)).unlock(id);
    return reply.send({ ok: true });
  });
}
