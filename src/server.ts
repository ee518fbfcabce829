import process from 'node:process';

import { getServiceConfig } from './config.js';
import { createRelayServer, shutdownServer } from './relay/server.js';
import { Logger } from './utils/logger.js';

async function main(): Promise<void> {
  const logger = Logger.getInstance('Server');

  const serviceConfig = getServiceConfig();
  const server = await createRelayServer({ serviceConfig });

  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down server...');
    await shutdownServer(server);
  };

  const handleSignal = (_signal: NodeJS.Signals): void => {
    void shutdown()
      .catch((error) => {
        logger.error('Error during server shutdown', error);
      })
      .finally(() => {
        process.exit(0);
      });
  };

  process.on('SIGINT', handleSignal);
  process.on('SIGTERM', handleSignal);
}

void main().catch((error) => {
  const logger = Logger.getInstance('Server');
  logger.error('Failed to start relay server', error);
  process.exit(1);
});
