/**
 * Test fakes and mocks
 */

import {
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
  type CompiledQuery,
  type DatabaseConnection,
  type Driver,
  type QueryResult,
} from 'kysely';
import { err } from 'neverthrow';

import { createDatabaseError } from '@/common/types/errors.js';
import { makeSnapshotFiscalDataRepo } from '@/modules/fiscal-data/index.js';

import { FIXTURE_SNAPSHOT_PATH, makeReferenceCodes } from './builders.js';

import type {
  FiscalDataError,
  FiscalDataRepository,
  SnapshotFiscalDataRepository,
} from '@/modules/fiscal-data/index.js';

// =============================================================================
// Fiscal Data Fakes
// =============================================================================

/**
 * Snapshot repository over tests/fixtures/snapshot.yaml.
 */
export const makeFixtureRepo = (): SnapshotFiscalDataRepository =>
  makeSnapshotFiscalDataRepo({
    filePath: FIXTURE_SNAPSHOT_PATH,
    referenceCodes: makeReferenceCodes(),
  });

/**
 * Creates a fake repository where every method fails with the same error.
 */
export const makeFailingFiscalDataRepo = (
  error: FiscalDataError = createDatabaseError('Connection refused')
): FiscalDataRepository => ({
  describe: () => ({ source: 'warehouse', location: 'postgres', tables: [] }),
  searchEntities: async () => err(error),
  findEntityByCode: async () => err(error),
  listRevenueLines: async () => err(error),
  listExpenditureLines: async () => err(error),
  listFundBalanceLines: async () => err(error),
  findIndebtedness: async () => err(error),
  listPensions: async () => err(error),
  listEntitiesByCounty: async () => err(error),
  getCountySummary: async () => err(error),
  rankEntities: async () => err(error),
  findPeers: async () => err(error),
});

/**
 * Wraps a repository and counts calls per method.
 */
export const withCallCounts = (
  repo: FiscalDataRepository
): { repo: FiscalDataRepository; calls: Map<string, number> } => {
  const calls = new Map<string, number>();
  const count = (method: string): void => {
    calls.set(method, (calls.get(method) ?? 0) + 1);
  };

  return {
    calls,
    repo: {
      describe: () => repo.describe(),
      searchEntities: (term, limit) => {
        count('searchEntities');
        return repo.searchEntities(term, limit);
      },
      findEntityByCode: (code) => {
        count('findEntityByCode');
        return repo.findEntityByCode(code);
      },
      listRevenueLines: (code) => {
        count('listRevenueLines');
        return repo.listRevenueLines(code);
      },
      listExpenditureLines: (code) => {
        count('listExpenditureLines');
        return repo.listExpenditureLines(code);
      },
      listFundBalanceLines: (code) => {
        count('listFundBalanceLines');
        return repo.listFundBalanceLines(code);
      },
      findIndebtedness: (code) => {
        count('findIndebtedness');
        return repo.findIndebtedness(code);
      },
      listPensions: (code) => {
        count('listPensions');
        return repo.listPensions(code);
      },
      listEntitiesByCounty: (county, entityType) => {
        count('listEntitiesByCounty');
        return repo.listEntitiesByCounty(county, entityType);
      },
      getCountySummary: (county) => {
        count('getCountySummary');
        return repo.getCountySummary(county);
      },
      rankEntities: (query) => {
        count('rankEntities');
        return repo.rankEntities(query);
      },
      findPeers: (query) => {
        count('findPeers');
        return repo.findPeers(query);
      },
    },
  };
};

// =============================================================================
// Kysely Fakes
// =============================================================================

export interface RecordedQuery {
  sql: string;
  parameters: readonly unknown[];
}

interface RecordingDbOptions {
  /** Rows returned for a compiled query (default: none) */
  respond?: (query: RecordedQuery) => Record<string, unknown>[];
  /** If provided, every query fails with this error */
  failWithError?: Error;
  /** If provided, every query is delayed by this many ms */
  delayMs?: number;
}

/**
 * Creates a real Kysely instance (Postgres dialect) whose driver records the
 * compiled SQL instead of sending it anywhere.
 */
export const makeRecordingDb = <DB>(
  options: RecordingDbOptions = {}
): { db: Kysely<DB>; queries: RecordedQuery[] } => {
  const { respond = () => [], failWithError, delayMs = 0 } = options;
  const queries: RecordedQuery[] = [];

  const connection: DatabaseConnection = {
    async executeQuery<R>(compiled: CompiledQuery): Promise<QueryResult<R>> {
      const recorded = { sql: compiled.sql, parameters: compiled.parameters };
      queries.push(recorded);
      if (delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, delayMs));
      }
      if (failWithError !== undefined) {
        throw failWithError;
      }
      // Row shape is whatever the test hands back for this query
      return { rows: respond(recorded) as R[] };
    },
    streamQuery() {
      throw new Error('Streaming is not supported by the recording driver');
    },
  };

  const driver: Driver = {
    init: async () => undefined,
    acquireConnection: async () => connection,
    beginTransaction: async () => undefined,
    commitTransaction: async () => undefined,
    rollbackTransaction: async () => undefined,
    releaseConnection: async () => undefined,
    destroy: async () => undefined,
  };

  const db = new Kysely<DB>({
    dialect: {
      createAdapter: () => new PostgresAdapter(),
      createDriver: () => driver,
      createIntrospector: (kysely) => new PostgresIntrospector(kysely),
      createQueryCompiler: () => new PostgresQueryCompiler(),
    },
  });

  return { db, queries };
};
