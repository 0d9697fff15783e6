import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { closePool } from './db.js';
import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('api');
const config = loadConfig();

const server = createApp().listen(config.API_PORT, () => {
  logger.info(`up on :${config.API_PORT}`);
});

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down`);
  server.close(() => {
    closePool()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error(`failed to close database pool: ${errorMessage(error)}`);
        process.exit(1);
      });
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
