import { closeDb, config, logger } from '@makerspace/shared';

import { createApp } from './app';
import { createSchedulingCore } from './application/schedulingCore';

async function main() {
  const core = createSchedulingCore();
  await core.init();

  const app = createApp({ core });
  const server = app.listen(config.PORT, () => {
    logger.info(
      { port: config.PORT, storage: config.STORAGE_DRIVER },
      'Reservation service listening'
    );
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      core
        .shutdown()
        .then(() => (config.STORAGE_DRIVER === 'postgres' ? closeDb() : undefined))
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ err: error }, 'Shutdown failed');
          process.exit(1);
        });
    });
  };

  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
}

main().catch((error: unknown) => {
  logger.error({ err: error }, 'Reservation service failed to start');
  process.exit(1);
});
