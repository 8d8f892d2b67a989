import 'reflect-metadata';
import AppDataSource from './ormconfig';
import { createApp } from './app';
import { config } from './config';
import { logger } from './logger';

async function main() {
  await AppDataSource.initialize();
  logger.info('DB initialized');

  if (config.runMigrationsOnStart) {
    logger.info('Running migrations...');
    const applied = await AppDataSource.runMigrations();
    logger.info({ applied: applied.map((m) => m.name) }, 'Migrations complete');
  }

  const app = createApp(AppDataSource);
  const server = app.listen(config.port, () => logger.info(`Server listening at http://localhost:${config.port}`));

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      AppDataSource.destroy()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Failed to close DataSource');
          process.exit(1);
        });
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err) => {
  logger.fatal({ err }, 'Startup error');
  process.exit(1);
});
