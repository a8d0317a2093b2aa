import Fastify from 'fastify';
import type { FastifyError } from 'fastify';
import { config } from './config';
import { registerItemRoutes } from './routes/items';
import { MemoryItemStorage } from './storage/memoryItemStorage';
import type { ItemStorageBackend } from './contracts/itemStorage';

export interface BuildAppOptions {
  store?: ItemStorageBackend;
  logger?: boolean | { level: string };
}

// Empty or malformed JSON bodies, rejected by Fastify's content-type parser
function isBodyParseError(error: FastifyError) {
  return (
    error instanceof SyntaxError ||
    error.code === 'FST_ERR_CTP_EMPTY_JSON_BODY' ||
    error.code === 'FST_ERR_CTP_INVALID_JSON_BODY'
  );
}

export async function buildApp(options: BuildAppOptions = {}) {
  const store = options.store ?? new MemoryItemStorage();
  const app = Fastify({ logger: options.logger ?? false });

  app.setErrorHandler((error, req, reply) => {
    if (isBodyParseError(error)) {
      req.log.warn({ err: error }, 'Unparseable request body');
      return reply
        .code(422)
        .send({ error: 'validation_failed', detail: { formErrors: [error.message], fieldErrors: {} } });
    }
    // everything else goes to Fastify's default handler
    return reply.send(error);
  });

  app.get('/', async () => ({
    message: `Welcome to ${config.service.name}`,
    version: config.service.version,
  }));

  app.get('/health', async () => ({ status: 'healthy', items: await store.size() }));

  await registerItemRoutes(app, store);
  return app;
}
