/**
 * Logger factory using Pino
 * Structured JSON logs, pretty-printed outside production
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
  /** Write to stderr instead of stdout (stdio transports own stdout) */
  stderr?: boolean;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'il-fiscal-data-server',
  pretty: process.env['NODE_ENV'] !== 'production',
};

const prettyTransport = (destination: 1 | 2) => ({
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
    destination,
  },
});

/**
 * Pino options shared by the standalone logger and Fastify's request logger.
 */
export const buildLoggerOptions = (config: Partial<LoggerConfig> = {}): LoggerOptions => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
  };

  if (finalConfig.pretty === true) {
    options.transport = prettyTransport(finalConfig.stderr === true ? 2 : 1);
  }

  return options;
};

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const options = buildLoggerOptions(config);
  if (config.stderr === true && options.transport === undefined) {
    return pinoLib(options, pinoLib.destination(2));
  }
  return pinoLib(options);
};

/**
 * Creates a child logger scoped to one component (repository, transport, ...)
 */
export const createChildLogger = (parent: Logger, component: string): Logger => {
  return parent.child({ component });
};

export { type Logger } from 'pino';
