/**
 * Port interfaces for the Fiscal Data module.
 *
 * Both storage backends (Postgres warehouse, YAML snapshot) implement
 * FiscalDataRepository; nothing above this port knows which one is active.
 */

import type { FiscalDataError } from './errors.js';
import type {
  CountyEntity,
  CountySummary,
  DataSourceDescription,
  EntityDetails,
  EntitySummary,
  FundBalanceLine,
  FundLine,
  IndebtednessRecord,
  PeerEntity,
  PeerQuery,
  PensionRecord,
  RankedEntity,
  RankQuery,
} from './types.js';
import type { Result } from 'neverthrow';

type RepoResult<T> = Promise<Result<T, FiscalDataError>>;

export interface FiscalDataRepository {
  describe(): DataSourceDescription;

  /**
   * Case-insensitive substring match on unit name or county.
   *
   * Ordering: exact name match, then name prefix match, then the rest,
   * each group sorted by name.
   */
  searchEntities(term: string, limit: number): RepoResult<EntitySummary[]>;

  findEntityByCode(code: string): RepoResult<EntityDetails | null>;

  /** Revenue lines ordered by category */
  listRevenueLines(code: string): RepoResult<FundLine[]>;

  /** Expenditure lines ordered by category */
  listExpenditureLines(code: string): RepoResult<FundLine[]>;

  /** Fund-balance classification lines ordered by category */
  listFundBalanceLines(code: string): RepoResult<FundBalanceLine[]>;

  findIndebtedness(code: string): RepoResult<IndebtednessRecord | null>;

  /** One record per retirement system present on the entity's pension row */
  listPensions(code: string): RepoResult<PensionRecord[]>;

  /** Ordered by population descending, unknown population last */
  listEntitiesByCounty(county: string, entityType?: string): RepoResult<CountyEntity[]>;

  /** Null when the county has no reporting units */
  getCountySummary(county: string): RepoResult<CountySummary | null>;

  /** Rows with a null metric are excluded */
  rankEntities(query: RankQuery): RepoResult<RankedEntity[]>;

  /** Ordered by absolute population difference to the target */
  findPeers(query: PeerQuery): RepoResult<PeerEntity[]>;
}
