/**
 * Kysely repository implementation over the Postgres fiscal data warehouse.
 */

import { Decimal } from 'decimal.js';
import { sql, type RawBuilder } from 'kysely';
import { ok, err, type Result } from 'neverthrow';

import {
  toCountyEntity,
  toEntityDetails,
  toEntitySummary,
  toFundBalanceLine,
  toFundLine,
  toIndebtedness,
  toPensionRecords,
} from './row-mappers.js';
import { WAREHOUSE_TABLES } from '../../../../infra/database/warehouse/types.js';
import { createDatabaseError, type FiscalDataError } from '../../core/errors.js';

import type { FiscalDataRepository } from '../../core/ports.js';
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
  RankMetric,
  RankQuery,
  ReferenceCodes,
} from '../../core/types.js';
import type { WarehouseDbClient } from '../../../../infra/database/client.js';

const FUND_COLUMNS = ['gn', 'sr', 'cp', 'ds', 'ep', 'ts', 'fd'] as const;

const UNIT_COLUMNS = [
  'ud.code',
  'ud.unit_name',
  'ud.description',
  'ud.county',
  'ud.unit_type',
] as const;

/**
 * Escapes special characters in LIKE patterns.
 */
const escapeLikePattern = (str: string): string => {
  return str.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_');
};

const METRIC_SQL: Record<RankMetric, RawBuilder<string | number | null>> = {
  population: sql<string | number | null>`us.pop`,
  eav: sql<string | number | null>`us.eav`,
  // Null only when neither head count was reported
  employees: sql<string | number | null>`case when us.full_emp is null and us.part_emp is null then null else coalesce(us.full_emp, 0) + coalesce(us.part_emp, 0) end`,
};

/**
 * Strips credentials from a connection string for display.
 */
const describeLocation = (connectionString: string): string => {
  try {
    const url = new URL(connectionString);
    return `${url.protocol}//${url.host}${url.pathname}`;
  } catch {
    return 'postgres';
  }
};

export interface WarehouseRepoOptions {
  db: WarehouseDbClient;
  referenceCodes: ReferenceCodes;
  /** Used only to describe the source; credentials are never exposed */
  connectionString?: string;
}

/**
 * Kysely-based implementation of FiscalDataRepository.
 */
class KyselyFiscalDataRepo implements FiscalDataRepository {
  private readonly db: WarehouseDbClient;
  private readonly codes: ReferenceCodes;
  private readonly location: string;

  constructor(options: WarehouseRepoOptions) {
    this.db = options.db;
    this.codes = options.referenceCodes;
    this.location =
      options.connectionString !== undefined
        ? describeLocation(options.connectionString)
        : 'postgres';
  }

  describe(): DataSourceDescription {
    return { source: 'warehouse', location: this.location, tables: [...WAREHOUSE_TABLES] };
  }

  async searchEntities(
    term: string,
    limit: number
  ): Promise<Result<EntitySummary[], FiscalDataError>> {
    try {
      const escaped = escapeLikePattern(term);
      const containsPattern = `%${escaped}%`;
      const prefixPattern = `${escaped}%`;

      const rows = await this.db
        .selectFrom('unit_data as ud')
        .select([...UNIT_COLUMNS])
        .where((eb) =>
          eb.or([
            eb('ud.unit_name', 'ilike', containsPattern),
            eb('ud.county', 'ilike', containsPattern),
          ])
        )
        .orderBy(
          sql`case when lower(ud.unit_name) = lower(${term}) then 0 when ud.unit_name ilike ${prefixPattern} then 1 else 2 end`
        )
        .orderBy('ud.unit_name', 'asc')
        .limit(limit)
        .execute();

      return ok(rows.map((row) => toEntitySummary(row, this.codes)));
    } catch (error) {
      return err(createDatabaseError('Failed to search entities', error));
    }
  }

  async findEntityByCode(code: string): Promise<Result<EntityDetails | null, FiscalDataError>> {
    try {
      const row = await this.db
        .selectFrom('unit_data as ud')
        .leftJoin('unit_stats as us', 'us.code', 'ud.code')
        .select([
          ...UNIT_COLUMNS,
          'ud.ceo_first_name',
          'ud.ceo_last_name',
          'ud.ceo_title',
          'ud.cfo_first_name',
          'ud.cfo_last_name',
          'ud.cfo_title',
          'us.pop',
          'us.eav',
          'us.full_emp',
          'us.part_emp',
          'us.home_rule',
          'us.debt',
          'us.bonded_debt',
        ])
        .where('ud.code', '=', code)
        .executeTakeFirst();

      if (row === undefined) {
        return ok(null);
      }

      return ok(toEntityDetails(row, row, this.codes));
    } catch (error) {
      return err(createDatabaseError('Failed to fetch entity by code', error));
    }
  }

  async listRevenueLines(code: string): Promise<Result<FundLine[], FiscalDataError>> {
    try {
      const rows = await this.db
        .selectFrom('revenues')
        .select(['category', ...FUND_COLUMNS])
        .where('code', '=', code)
        .orderBy('category', 'asc')
        .execute();

      return ok(rows.map(toFundLine));
    } catch (error) {
      return err(createDatabaseError('Failed to fetch revenues', error));
    }
  }

  async listExpenditureLines(code: string): Promise<Result<FundLine[], FiscalDataError>> {
    try {
      const rows = await this.db
        .selectFrom('expenditures')
        .select(['category', ...FUND_COLUMNS])
        .where('code', '=', code)
        .orderBy('category', 'asc')
        .execute();

      return ok(rows.map(toFundLine));
    } catch (error) {
      return err(createDatabaseError('Failed to fetch expenditures', error));
    }
  }

  async listFundBalanceLines(code: string): Promise<Result<FundBalanceLine[], FiscalDataError>> {
    try {
      const rows = await this.db
        .selectFrom('fund_balances')
        .select(['category', ...FUND_COLUMNS, 'dp'])
        .where('code', '=', code)
        .orderBy('category', 'asc')
        .execute();

      return ok(rows.map(toFundBalanceLine));
    } catch (error) {
      return err(createDatabaseError('Failed to fetch fund balances', error));
    }
  }

  async findIndebtedness(
    code: string
  ): Promise<Result<IndebtednessRecord | null, FiscalDataError>> {
    try {
      const row = await this.db
        .selectFrom('indebtedness')
        .select(['t404', 't410', 'a401', 'b401', 'c401', 'd401', 'e401'])
        .where('code', '=', code)
        .executeTakeFirst();

      return ok(row === undefined ? null : toIndebtedness(row));
    } catch (error) {
      return err(createDatabaseError('Failed to fetch indebtedness', error));
    }
  }

  async listPensions(code: string): Promise<Result<PensionRecord[], FiscalDataError>> {
    try {
      const row = await this.db
        .selectFrom('pensions')
        .selectAll()
        .where('code', '=', code)
        .executeTakeFirst();

      return ok(row === undefined ? [] : toPensionRecords(row));
    } catch (error) {
      return err(createDatabaseError('Failed to fetch pensions', error));
    }
  }

  async listEntitiesByCounty(
    county: string,
    entityType?: string
  ): Promise<Result<CountyEntity[], FiscalDataError>> {
    try {
      let query = this.db
        .selectFrom('unit_data as ud')
        .leftJoin('unit_stats as us', 'us.code', 'ud.code')
        .select([...UNIT_COLUMNS, 'us.pop', 'us.eav', 'us.home_rule'])
        .where((eb) => eb(eb.fn('lower', ['ud.county']), '=', county.toLowerCase()));

      if (entityType !== undefined) {
        query = query.where((eb) =>
          eb(eb.fn('lower', ['ud.description']), '=', entityType.toLowerCase())
        );
      }

      const rows = await query
        .orderBy(sql`us.pop desc nulls last`)
        .orderBy('ud.unit_name', 'asc')
        .execute();

      return ok(rows.map((row) => toCountyEntity(row, row, this.codes)));
    } catch (error) {
      return err(createDatabaseError('Failed to list county entities', error));
    }
  }

  async getCountySummary(county: string): Promise<Result<CountySummary | null, FiscalDataError>> {
    try {
      const row = await this.db
        .selectFrom('unit_data as ud')
        .leftJoin('unit_stats as us', 'us.code', 'ud.code')
        .select([
          sql<string | null>`min(ud.county)`.as('county'),
          sql<string>`count(distinct ud.code)`.as('entity_count'),
          sql<string>`count(distinct ud.description)`.as('entity_type_count'),
          sql<string | null>`sum(us.pop)`.as('total_population'),
          sql<string | null>`sum(us.eav)`.as('total_eav'),
          sql<string | null>`sum(us.full_emp)`.as('total_full_emp'),
          sql<string | null>`sum(us.part_emp)`.as('total_part_emp'),
          sql<string>`count(*) filter (where us.home_rule = 'Y')`.as('home_rule_count'),
          sql<string>`count(*) filter (where us.debt = 'Y')`.as('entities_with_debt'),
        ])
        .where((eb) => eb(eb.fn('lower', ['ud.county']), '=', county.toLowerCase()))
        .executeTakeFirst();

      const entityCount = Number(row?.entity_count ?? 0);
      if (row === undefined || entityCount === 0) {
        return ok(null);
      }

      return ok({
        county: row.county ?? county,
        entityCount,
        entityTypeCount: Number(row.entity_type_count),
        totalPopulation: Number(row.total_population ?? 0),
        totalAssessedValue: new Decimal(row.total_eav ?? 0),
        totalFullTimeEmployees: Number(row.total_full_emp ?? 0),
        totalPartTimeEmployees: Number(row.total_part_emp ?? 0),
        homeRuleCount: Number(row.home_rule_count),
        entitiesWithDebt: Number(row.entities_with_debt),
      });
    } catch (error) {
      return err(createDatabaseError('Failed to summarize county', error));
    }
  }

  async rankEntities(query: RankQuery): Promise<Result<RankedEntity[], FiscalDataError>> {
    try {
      const metric = METRIC_SQL[query.metric];
      const direction = sql.raw(query.order === 'top' ? 'desc' : 'asc');

      let builder = this.db
        .selectFrom('unit_data as ud')
        .innerJoin('unit_stats as us', 'us.code', 'ud.code')
        .select([
          ...UNIT_COLUMNS,
          metric.as('metric_value'),
          sql<string>`rank() over (order by ${metric} ${direction})`.as('metric_rank'),
        ])
        .where(sql<boolean>`${metric} is not null`);

      if (query.entityType !== undefined) {
        const entityType = query.entityType.toLowerCase();
        builder = builder.where((eb) => eb(eb.fn('lower', ['ud.description']), '=', entityType));
      }
      if (query.county !== undefined) {
        const county = query.county.toLowerCase();
        builder = builder.where((eb) => eb(eb.fn('lower', ['ud.county']), '=', county));
      }

      const rows = await builder
        .orderBy('metric_rank', 'asc')
        .orderBy('ud.unit_name', 'asc')
        .limit(query.limit)
        .execute();

      const ranked: RankedEntity[] = [];
      for (const row of rows) {
        if (row.metric_value === null) continue;
        ranked.push({
          ...toEntitySummary(row, this.codes),
          rank: Number(row.metric_rank),
          value: new Decimal(row.metric_value),
        });
      }
      return ok(ranked);
    } catch (error) {
      return err(createDatabaseError('Failed to rank entities', error));
    }
  }

  async findPeers(query: PeerQuery): Promise<Result<PeerEntity[], FiscalDataError>> {
    try {
      const lower = query.population * (1 - query.populationRange);
      const upper = query.population * (1 + query.populationRange);

      let builder = this.db
        .selectFrom('unit_data as ud')
        .innerJoin('unit_stats as us', 'us.code', 'ud.code')
        .select([...UNIT_COLUMNS, 'us.pop', 'us.eav'])
        .where('ud.code', '<>', query.code)
        .where('us.pop', '>=', lower)
        .where('us.pop', '<=', upper);

      if (query.entityType !== null) {
        const entityType = query.entityType.toLowerCase();
        builder = builder.where((eb) => eb(eb.fn('lower', ['ud.description']), '=', entityType));
      }

      const rows = await builder
        .orderBy(sql`abs(us.pop - ${query.population})`)
        .orderBy('ud.unit_name', 'asc')
        .limit(query.limit)
        .execute();

      const peers: PeerEntity[] = [];
      for (const row of rows) {
        if (row.pop === null) continue;
        peers.push({
          ...toEntitySummary(row, this.codes),
          population: row.pop,
          assessedValue: row.eav === null ? null : new Decimal(row.eav),
          populationDifference: Math.abs(row.pop - query.population),
        });
      }
      return ok(peers);
    } catch (error) {
      return err(createDatabaseError('Failed to find peer entities', error));
    }
  }
}

/**
 * Factory function to create the warehouse-backed FiscalDataRepository.
 */
export const makeWarehouseFiscalDataRepo = (options: WarehouseRepoOptions): FiscalDataRepository => {
  return new KyselyFiscalDataRepo(options);
};
