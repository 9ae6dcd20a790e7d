import { loadServerConfig } from './config/serverConfig.js';
import { DroplineServer } from './server.js';
import { logger, setLogLevel } from './utils/logger.js';

const config = loadServerConfig();
setLogLevel(config.logging.level);

logger.info('Starting Dropline session server...');

const server = new DroplineServer({ config });

async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down...`);
  try {
    await server.close();
    process.exit(0);
  } catch (error) {
    logger.error('Shutdown failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

server.listen().catch((error: unknown) => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
