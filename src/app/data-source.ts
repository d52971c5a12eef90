/**
 * Data source wiring
 * Picks the warehouse or snapshot adapter from configuration
 */

import { createWarehouseClient } from '../infra/database/client.js';
import { createChildLogger, type Logger } from '../infra/logger/index.js';
import {
  makeSnapshotFiscalDataRepo,
  makeWarehouseFiscalDataRepo,
  type FiscalDataRepository,
  type ReferenceCodes,
} from '../modules/fiscal-data/index.js';
import {
  makeDbHealthChecker,
  makeSnapshotHealthChecker,
  type HealthChecker,
} from '../modules/health/index.js';

import type { AppConfig } from '../infra/config/index.js';

export interface DataSourceHandle {
  fiscalDataRepo: FiscalDataRepository;
  healthCheckers: HealthChecker[];
  /** Releases connections held by the source */
  close(): Promise<void>;
}

export const createDataSource = (
  config: AppConfig,
  referenceCodes: ReferenceCodes,
  logger: Logger
): DataSourceHandle => {
  const { dataSource } = config;

  if (dataSource.kind === 'warehouse') {
    if (dataSource.warehouseUrl === undefined) {
      throw new Error('WAREHOUSE_DATABASE_URL is required when DATA_SOURCE=warehouse');
    }

    const db = createWarehouseClient({ connectionString: dataSource.warehouseUrl });
    logger.info('Using fiscal data warehouse');

    return {
      fiscalDataRepo: makeWarehouseFiscalDataRepo({
        db,
        referenceCodes,
        connectionString: dataSource.warehouseUrl,
      }),
      healthCheckers: [makeDbHealthChecker(db, { name: 'warehouse' })],
      close: () => db.destroy(),
    };
  }

  const snapshotRepo = makeSnapshotFiscalDataRepo({
    filePath: dataSource.snapshotPath,
    referenceCodes,
    logger: createChildLogger(logger, 'snapshot-repo'),
  });
  logger.info({ path: dataSource.snapshotPath }, 'Using fiscal data snapshot');

  return {
    fiscalDataRepo: snapshotRepo,
    healthCheckers: [makeSnapshotHealthChecker(snapshotRepo, { name: 'snapshot' })],
    close: async () => {
      // Nothing held open
    },
  };
};
