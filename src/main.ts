/**
 * Registry server entry point.
 */

import { loadConfig } from './config';
import { errorMessage } from './domain/errors';
import { logger } from './logger';
import { createApp, createAppContext } from './server';

async function main(): Promise<void> {
  const config = loadConfig();
  const context = await createAppContext(config);
  const app = createApp(context);

  context.registry.scheduler.start();
  const server = app.listen(config.port, () => {
    logger.info('Registry listening', {
      port: config.port,
      storagePath: config.storagePath,
      databasePath: config.databasePath,
    });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close();
    context.registry.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(err) });
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  logger.error('Startup failed', { error: errorMessage(err) });
  process.exit(1);
});
