import { buildApp } from './server';
import { config } from './config';

/**
 * Main entrypoint for the item service.
 * Builds the app around a fresh in-memory store and listens on configured host/port.
 */
async function main() {
  const app = await buildApp({ logger: { level: config.logLevel } });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`${config.service.name} listening on http://${config.host}:${config.port}`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting item service:', err);
  process.exit(1);
});
