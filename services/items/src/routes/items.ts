import type { FastifyInstance, FastifyReply } from 'fastify';
import type { z } from 'zod';
import { itemIdParamsSchema } from '../schemas/item';
import { ItemNotFoundError, ItemValidationError } from '../errors';
import type { ItemStorageBackend } from '../contracts/itemStorage';

// ---------- Helpers ----------
function invalidParams(reply: FastifyReply, error: z.ZodError) {
  return reply.code(422).send({ error: 'validation_failed', detail: error.flatten() });
}

function sendStoreError(reply: FastifyReply, err: unknown) {
  if (err instanceof ItemNotFoundError) {
    reply.log.warn({ id: err.id }, 'Item not found');
    return reply.code(404).send({ error: 'not_found', detail: err.message, id: err.id });
  }
  if (err instanceof ItemValidationError) {
    return reply.code(422).send({ error: 'validation_failed', detail: err.issues });
  }
  // anything else is a server fault; let Fastify log it and answer 500
  throw err;
}

// ---------- Routes ----------
export async function registerItemRoutes(app: FastifyInstance, store: ItemStorageBackend) {
  // List
  app.get('/items', async (_req, reply) => {
    return reply.send(await store.list());
  });

  // Read
  app.get('/items/:id', async (req, reply) => {
    const params = itemIdParamsSchema.safeParse(req.params);
    if (!params.success) return invalidParams(reply, params.error);

    try {
      return reply.send(await store.get(params.data.id));
    } catch (err) {
      return sendStoreError(reply, err);
    }
  });

  // Create
  app.post('/items', async (req, reply) => {
    try {
      const item = await store.create(req.body);
      req.log.info({ id: item.id }, 'Item created');
      return reply.send(item);
    } catch (err) {
      return sendStoreError(reply, err);
    }
  });

  // Full replace
  app.put('/items/:id', async (req, reply) => {
    const params = itemIdParamsSchema.safeParse(req.params);
    if (!params.success) return invalidParams(reply, params.error);

    try {
      const item = await store.update(params.data.id, req.body);
      req.log.info({ id: item.id }, 'Item updated');
      return reply.send(item);
    } catch (err) {
      return sendStoreError(reply, err);
    }
  });

  // Delete
  app.delete('/items/:id', async (req, reply) => {
    const params = itemIdParamsSchema.safeParse(req.params);
    if (!params.success) return invalidParams(reply, params.error);

    try {
      const removed = await store.delete(params.data.id);
      req.log.info({ id: removed.id }, 'Item deleted');
      return reply.send({ message: `Item '${removed.name}' deleted` });
    } catch (err) {
      return sendStoreError(reply, err);
    }
  });
}
