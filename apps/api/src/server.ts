import { serverConfig, validateEnv } from '@config';
import { getLogger, toError } from '@kernel/logger';

import { buildApp } from './app';
import { createContainer } from './container';

try {
  validateEnv();
} catch (error) {
  // Logger not available yet at this point - stderr is acceptable for startup failure
  process.stderr.write(`[startup] Environment validation failed: ${error instanceof Error ? error.message : error}\n`);
  process.exit(1);
}

const logger = getLogger('server');

async function main(): Promise<void> {
  const container = await createContainer();
  const app = await buildApp({ services: container.services, healthChecks: container.healthChecks });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });
    try {
      await app.close();
      await container.close();
      process.exit(0);
    } catch (error) {
      logger.error('Shutdown failed', toError(error));
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: serverConfig.port, host: serverConfig.host });
  logger.info('API listening', { port: serverConfig.port, host: serverConfig.host });
}

main().catch((error: unknown) => {
  logger.fatal('API failed to start', toError(error));
  process.exit(1);
});
