import { ConfigError, loadConfig } from './config';
import { createApp } from './app';
import { DatabaseConnection } from './database/connection';
import { EntityStore } from './database/EntityStore';
import { gracefulShutdown } from './middleware/errorHandler';
import logger, { createLogger } from './utils/logger';

const log = createLogger('Main');

const main = (): void => {
  const config = loadConfig();
  logger.level = config.logLevel;

  const connection = new DatabaseConnection({
    filename: config.databasePath,
    timeoutMs: config.busyTimeoutMs,
  });
  connection.open();
  connection.ensureSchema();

  const store = new EntityStore(connection);
  const app = createApp(store);

  const server = app.listen(config.port, () => {
    log.info(`Server is running on port ${config.port}`);
    log.info(`Environment: ${config.nodeEnv}`);
    log.info(`Database: ${config.databasePath}`);
  });

  const shutdown = gracefulShutdown(server, () => store.close(), log);
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

try {
  main();
} catch (error) {
  if (error instanceof ConfigError) {
    log.error(error.message, { issues: error.issues });
  } else {
    log.error('Failed to start:', error);
  }
  process.exit(1);
}
