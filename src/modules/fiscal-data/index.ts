/**
 * Fiscal Data Module - Public API
 *
 * Storage-agnostic access to the annual financial reports of Illinois local
 * governments, backed by the Postgres warehouse or a YAML snapshot.
 */

// =============================================================================
// Repository
// =============================================================================
export type { FiscalDataRepository } from './core/ports.js';
export { requireEntity } from './core/require-entity.js';
export {
  makeWarehouseFiscalDataRepo,
  type WarehouseRepoOptions,
} from './shell/repo/warehouse-repo.js';
export {
  makeSnapshotFiscalDataRepo,
  readSnapshotFile,
  buildSnapshotIndex,
  type SnapshotFiscalDataRepository,
  type SnapshotIndex,
  type SnapshotRepoOptions,
} from './shell/repo/snapshot-repo.js';
export { SnapshotFileSchema, type SnapshotFile } from './shell/repo/snapshot-schema.js';
export {
  loadReferenceCodes,
  DEFAULT_REFERENCE_CODES_URL,
} from './shell/reference/reference-codes.js';
export { makeFiscalDataRoutes, type MakeFiscalDataRoutesDeps } from './shell/rest/routes.js';

// =============================================================================
// Types
// =============================================================================
export type {
  CountyEntity,
  CountySummary,
  DataSourceDescription,
  DebtInstrument,
  EntityDetails,
  EntitySummary,
  FundAmounts,
  FundBalanceLine,
  FundKey,
  FundLine,
  IndebtednessRecord,
  Official,
  PeerEntity,
  PeerQuery,
  PensionRecord,
  PensionSystem,
  RankedEntity,
  RankMetric,
  RankOrder,
  RankQuery,
  ReferenceCodes,
} from './core/types.js';
export { FUND_KEYS, DEBT_INSTRUMENTS, PENSION_SYSTEMS, RANK_METRICS } from './core/types.js';

// =============================================================================
// Errors
// =============================================================================
export type { FiscalDataError } from './core/errors.js';
