import { buildApp } from './app';
import { logger } from '@utils/logger';

async function start() {
  const app = await buildApp();

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Error during shutdown');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await app.listen({ port: app.config.PORT, host: app.config.HOST });
  logger.info(
    { port: app.config.PORT, docs: app.config.SWAGGER_ENABLED ? app.config.SWAGGER_PATH : undefined },
    'Chronicle listening'
  );
}

start().catch((err: unknown) => {
  logger.error({ err }, 'Failed to start server');
  process.exit(1);
});
