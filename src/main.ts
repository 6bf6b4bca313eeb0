// src/main.ts
// Process entry point: build the server, listen, close cleanly on signals.
import { config } from './config';
import { buildServer } from './server';
import { createLogger } from './observability';

const log = createLogger('server');

async function main(): Promise<void> {
  const app = await buildServer();

  const shutdown = (signal: NodeJS.Signals) => {
    log.info({ signal }, 'shutting down');
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'error during shutdown');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await app.listen({ port: config.server.port, host: config.server.host });
  log.info({ port: config.server.port, host: config.server.host }, 'API listening');
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'failed to start');
  process.exit(1);
});
