/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { createDataSource } from './app/data-source.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { buildLoggerOptions, createLogger } from './infra/logger/index.js';
import { loadReferenceCodes } from './modules/fiscal-data/index.js';

const LOGGER_NAME = 'il-fiscal-data-server';

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  // Create logger
  const logger = createLogger({
    level: config.logger.level,
    name: LOGGER_NAME,
    pretty: config.logger.pretty,
  });

  logger.info(
    { config: { server: config.server, dataSource: config.dataSource.kind } },
    'Starting API server'
  );

  // Initialize dependencies
  const referenceCodes = loadReferenceCodes();
  const dataSource = createDataSource(config, referenceCodes, logger);

  // Build application - Fastify creates its own request logger from the same options
  const app = await buildApp({
    fastifyOptions: {
      logger: buildLoggerOptions({
        level: config.logger.level,
        name: LOGGER_NAME,
        pretty: config.logger.pretty,
      }),
      disableRequestLogging: false,
    },
    deps: {
      fiscalDataRepo: dataSource.fiscalDataRepo,
      healthCheckers: dataSource.healthCheckers,
      referenceCodes,
      config,
    },
    version: process.env['APP_VERSION'] ?? '0.1.0',
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      await dataSource.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // Start server
  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
