/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Fiscal data storage
  DATA_SOURCE: Type.Union([Type.Literal('warehouse'), Type.Literal('snapshot')], {
    default: 'snapshot',
  }),
  WAREHOUSE_DATABASE_URL: Type.Optional(Type.String({ minLength: 1 })),
  SNAPSHOT_PATH: Type.String({ minLength: 1, default: './data/fiscal-snapshot.yaml' }),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
  CLIENT_BASE_URL: Type.Optional(Type.String()),

  // MCP
  MCP_API_KEY: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

export type DataSource = Env['DATA_SOURCE'];

const emptyToUndefined = (value: string | undefined): string | undefined =>
  value === undefined || value === '' ? undefined : value;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: env['PORT'] != null && env['PORT'] !== '' ? Number.parseInt(env['PORT'], 10) : 3000,
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATA_SOURCE: env['DATA_SOURCE'] ?? 'snapshot',
    WAREHOUSE_DATABASE_URL: emptyToUndefined(env['WAREHOUSE_DATABASE_URL']),
    SNAPSHOT_PATH: env['SNAPSHOT_PATH'] ?? './data/fiscal-snapshot.yaml',
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
    CLIENT_BASE_URL: env['CLIENT_BASE_URL'],
    MCP_API_KEY: emptyToUndefined(env['MCP_API_KEY']),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  if (rawEnv.DATA_SOURCE === 'warehouse' && rawEnv.WAREHOUSE_DATABASE_URL === undefined) {
    throw new Error(
      'Invalid environment configuration: WAREHOUSE_DATABASE_URL is required when DATA_SOURCE=warehouse'
    );
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  dataSource: {
    kind: env.DATA_SOURCE,
    /** Postgres connection string, only read when kind is 'warehouse' */
    warehouseUrl: env.WAREHOUSE_DATABASE_URL,
    /** YAML export of the desktop database, only read when kind is 'snapshot' */
    snapshotPath: env.SNAPSHOT_PATH,
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS,
    clientBaseUrl: env.CLIENT_BASE_URL,
  },
  mcp: {
    apiKey: env.MCP_API_KEY,
    authRequired: env.MCP_API_KEY !== undefined,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
