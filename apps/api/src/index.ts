/**
 * API Server Entry Point
 * 
 * Loads configuration, wires services and serves the HTTP API until a
 * shutdown signal arrives. Running jobs are aborted on shutdown.
 */

import { createServer } from './server.js';
import { loadConfig, loadEnvFile } from './config/index.js';
import { createServices } from './lib/container.js';
import { logger } from './lib/logger.js';

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  const services = await createServices(config);
  const server = await createServer(config, services);

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await server.close();
      await services.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  // Graceful shutdown
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      void shutdown(signal);
    });
  }

  await server.listen({
    host: config.host,
    port: config.port,
  });

  logger.info({
    port: config.port,
    env: config.nodeEnv,
    storage: services.blobs.name,
  }, 'API server started');
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
