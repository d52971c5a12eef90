/**
 * MCP stdio entry point
 * Serves the fiscal data tools to a local MCP client (desktop assistants, IDEs).
 * stdout carries the protocol, so every log line goes to stderr.
 */

import { createDataSource } from './app/data-source.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { createLogger } from './infra/logger/index.js';
import { loadReferenceCodes } from './modules/fiscal-data/index.js';
import { runMcpServerStdio } from './modules/mcp/index.js';

const main = async (): Promise<void> => {
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    name: 'il-fiscal-mcp',
    pretty: false,
    stderr: true,
  });

  const referenceCodes = loadReferenceCodes();
  const dataSource = createDataSource(config, referenceCodes, logger);

  const server = await runMcpServerStdio({
    fiscalDataRepo: dataSource.fiscalDataRepo,
    referenceCodes,
    version: process.env['APP_VERSION'] ?? '0.1.0',
  });
  logger.info({ dataSource: config.dataSource.kind }, 'MCP server running on stdio');

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');
    try {
      await server.close();
      await dataSource.close();
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
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
