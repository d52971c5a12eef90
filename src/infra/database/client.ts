import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { WarehouseDatabase } from './warehouse/types.js';

const { Pool: PG_POOL } = pg;

export type WarehouseDbClient = Kysely<WarehouseDatabase>;

export interface WarehouseClientOptions {
  connectionString: string;
  /** Pool size (default: 10) */
  maxConnections?: number;
}

/**
 * Create the Kysely client for the fiscal data warehouse
 */
export const createWarehouseClient = (options: WarehouseClientOptions): WarehouseDbClient => {
  const { connectionString, maxConnections = 10 } = options;

  if (connectionString === '') {
    throw new Error('Missing configuration for fiscal data warehouse (WAREHOUSE_DATABASE_URL)');
  }

  return new Kysely<WarehouseDatabase>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max: maxConnections,
      }),
    }),
  });
};

export * from './warehouse/types.js';
