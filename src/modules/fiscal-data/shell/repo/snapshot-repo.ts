import fs from 'node:fs/promises';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

import {
  toCountyEntity,
  toDecimal,
  toEntityDetails,
  toEntitySummary,
  toFlag,
  toFundBalanceLine,
  toFundLine,
  toIndebtedness,
  toPensionRecords,
} from './row-mappers.js';
import {
  SNAPSHOT_TABLES,
  SnapshotFileSchema,
  type FundBalanceRow,
  type FundLineRow,
  type IndebtednessRow,
  type PensionRow,
  type SnapshotFile,
  type UnitDataRow,
  type UnitStatsRow,
} from './snapshot-schema.js';
import { createSnapshotError, type FiscalDataError } from '../../core/errors.js';

import type { FiscalDataRepository } from '../../core/ports.js';
import type {
  CountySummary,
  PeerEntity,
  RankedEntity,
  RankMetric,
  ReferenceCodes,
} from '../../core/types.js';
import type { Logger } from 'pino';

const validator = TypeCompiler.Compile(SnapshotFileSchema);

// ─────────────────────────────────────────────────────────────────────────────
// Index
// ─────────────────────────────────────────────────────────────────────────────

export interface SnapshotIndex {
  reportingYear: number | null;
  units: UnitDataRow[];
  unitsByCode: Map<string, UnitDataRow>;
  statsByCode: Map<string, UnitStatsRow>;
  revenuesByCode: Map<string, FundLineRow[]>;
  expendituresByCode: Map<string, FundLineRow[]>;
  fundBalancesByCode: Map<string, FundBalanceRow[]>;
  indebtednessByCode: Map<string, IndebtednessRow>;
  pensionsByCode: Map<string, PensionRow>;
}

const groupByCode = <T extends { code: string }>(rows: readonly T[] = []): Map<string, T[]> => {
  const grouped = new Map<string, T[]>();
  for (const row of rows) {
    const bucket = grouped.get(row.code);
    if (bucket === undefined) {
      grouped.set(row.code, [row]);
    } else {
      bucket.push(row);
    }
  }
  return grouped;
};

/** First row per code wins, as a unique key would enforce */
const indexByCode = <T extends { code: string }>(rows: readonly T[] = []): Map<string, T> => {
  const indexed = new Map<string, T>();
  for (const row of rows) {
    if (!indexed.has(row.code)) {
      indexed.set(row.code, row);
    }
  }
  return indexed;
};

const compareText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

const byCategory = (a: { category: string }, b: { category: string }): number =>
  compareText(a.category, b.category);

export const buildSnapshotIndex = (file: SnapshotFile): SnapshotIndex => ({
  reportingYear: file.reporting_year ?? null,
  units: file.unit_data,
  unitsByCode: indexByCode(file.unit_data),
  statsByCode: indexByCode(file.unit_stats),
  revenuesByCode: groupByCode(file.revenues),
  expendituresByCode: groupByCode(file.expenditures),
  fundBalancesByCode: groupByCode(file.fund_balances),
  indebtednessByCode: indexByCode(file.indebtedness),
  pensionsByCode: indexByCode(file.pensions),
});

// ─────────────────────────────────────────────────────────────────────────────
// File loading
// ─────────────────────────────────────────────────────────────────────────────

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const readSnapshotFile = async (
  filePath: string
): Promise<Result<SnapshotFile, FiscalDataError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return err(createSnapshotError(`Snapshot file not found at ${filePath}`, error));
    }
    return err(
      createSnapshotError(`Failed to read snapshot at ${filePath}: ${errorMessage(error)}`, error)
    );
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    return err(
      createSnapshotError(`Failed to parse YAML at ${filePath}: ${errorMessage(error)}`, error)
    );
  }

  if (!validator.Check(parsed)) {
    const details = [...validator.Errors(parsed)]
      .slice(0, 10)
      .map((e) => `${e.path}: ${e.message}`)
      .join('; ');
    return err(createSnapshotError(`Schema validation failed for ${filePath}: ${details}`));
  }

  return ok(parsed);
};

// ─────────────────────────────────────────────────────────────────────────────
// In-memory queries
// ─────────────────────────────────────────────────────────────────────────────

const lowerEquals = (value: string | null | undefined, expected: string): boolean =>
  value !== null && value !== undefined && value.toLowerCase() === expected.toLowerCase();

const metricValue = (stats: UnitStatsRow, metric: RankMetric): Decimal | null => {
  switch (metric) {
    case 'population':
      return stats.pop === null || stats.pop === undefined ? null : new Decimal(stats.pop);
    case 'eav':
      return toDecimal(stats.eav);
    case 'employees': {
      const fullTime = stats.full_emp ?? null;
      const partTime = stats.part_emp ?? null;
      if (fullTime === null && partTime === null) {
        return null;
      }
      return new Decimal(fullTime ?? 0).plus(partTime ?? 0);
    }
  }
};

export interface SnapshotRepoOptions {
  filePath: string;
  referenceCodes: ReferenceCodes;
  logger?: Logger;
}

export interface SnapshotFiscalDataRepository extends FiscalDataRepository {
  /** Loads and validates the file on first use; later calls reuse the index */
  ensureLoaded(): Promise<Result<SnapshotIndex, FiscalDataError>>;
}

export const makeSnapshotFiscalDataRepo = (
  options: SnapshotRepoOptions
): SnapshotFiscalDataRepository => {
  const { filePath, referenceCodes: codes, logger } = options;

  let index: SnapshotIndex | null = null;
  let indexPromise: Promise<Result<SnapshotIndex, FiscalDataError>> | null = null;

  const load = async (): Promise<Result<SnapshotIndex, FiscalDataError>> => {
    const fileResult = await readSnapshotFile(filePath);
    if (fileResult.isErr()) {
      return err(fileResult.error);
    }
    const built = buildSnapshotIndex(fileResult.value);
    logger?.info(
      { filePath, units: built.units.length, reportingYear: built.reportingYear },
      'Loaded fiscal data snapshot'
    );
    return ok(built);
  };

  const ensureLoaded = async (): Promise<Result<SnapshotIndex, FiscalDataError>> => {
    if (index !== null) {
      return ok(index);
    }

    indexPromise ??= load();

    const result = await indexPromise;
    if (result.isOk()) {
      index = result.value;
    } else {
      // Allow a retry once the file is fixed
      indexPromise = null;
    }

    return result;
  };

  /** Runs a query against the loaded index */
  const withIndex = async <T>(
    query: (idx: SnapshotIndex) => T
  ): Promise<Result<T, FiscalDataError>> => {
    const loaded = await ensureLoaded();
    return loaded.map(query);
  };

  return {
    ensureLoaded,

    describe() {
      return { source: 'snapshot', location: filePath, tables: [...SNAPSHOT_TABLES] };
    },

    searchEntities(term, limit) {
      return withIndex((idx) => {
        const needle = term.toLowerCase();
        const matchGroup = (unit: UnitDataRow): number => {
          const name = unit.unit_name.toLowerCase();
          if (name === needle) return 0;
          if (name.startsWith(needle)) return 1;
          return 2;
        };

        return idx.units
          .filter(
            (unit) =>
              unit.unit_name.toLowerCase().includes(needle) ||
              (unit.county ?? '').toLowerCase().includes(needle)
          )
          .sort((a, b) => matchGroup(a) - matchGroup(b) || compareText(a.unit_name, b.unit_name))
          .slice(0, limit)
          .map((unit) => toEntitySummary(unit, codes));
      });
    },

    findEntityByCode(code) {
      return withIndex((idx) => {
        const unit = idx.unitsByCode.get(code);
        return unit === undefined ? null : toEntityDetails(unit, idx.statsByCode.get(code), codes);
      });
    },

    listRevenueLines(code) {
      return withIndex((idx) =>
        [...(idx.revenuesByCode.get(code) ?? [])].sort(byCategory).map(toFundLine)
      );
    },

    listExpenditureLines(code) {
      return withIndex((idx) =>
        [...(idx.expendituresByCode.get(code) ?? [])].sort(byCategory).map(toFundLine)
      );
    },

    listFundBalanceLines(code) {
      return withIndex((idx) =>
        [...(idx.fundBalancesByCode.get(code) ?? [])].sort(byCategory).map(toFundBalanceLine)
      );
    },

    findIndebtedness(code) {
      return withIndex((idx) => {
        const row = idx.indebtednessByCode.get(code);
        return row === undefined ? null : toIndebtedness(row);
      });
    },

    listPensions(code) {
      return withIndex((idx) => {
        const row = idx.pensionsByCode.get(code);
        return row === undefined ? [] : toPensionRecords(row);
      });
    },

    listEntitiesByCounty(county, entityType) {
      return withIndex((idx) =>
        idx.units
          .filter(
            (unit) =>
              lowerEquals(unit.county, county) &&
              (entityType === undefined || lowerEquals(unit.description, entityType))
          )
          .map((unit) => toCountyEntity(unit, idx.statsByCode.get(unit.code), codes))
          .sort((a, b) => {
            if (a.population !== b.population) {
              if (a.population === null) return 1;
              if (b.population === null) return -1;
              return b.population - a.population;
            }
            return compareText(a.name, b.name);
          })
      );
    },

    getCountySummary(county) {
      return withIndex((idx): CountySummary | null => {
        const units = idx.units.filter((unit) => lowerEquals(unit.county, county));
        const first = units[0];
        if (first === undefined) {
          return null;
        }

        const entityTypes = new Set<string>();
        const summary: CountySummary = {
          county: first.county ?? county,
          entityCount: new Set(units.map((unit) => unit.code)).size,
          entityTypeCount: 0,
          totalPopulation: 0,
          totalAssessedValue: new Decimal(0),
          totalFullTimeEmployees: 0,
          totalPartTimeEmployees: 0,
          homeRuleCount: 0,
          entitiesWithDebt: 0,
        };

        for (const unit of units) {
          if (unit.description !== null && unit.description !== undefined) {
            entityTypes.add(unit.description);
          }
          const stats = idx.statsByCode.get(unit.code);
          if (stats === undefined) continue;
          summary.totalPopulation += stats.pop ?? 0;
          summary.totalAssessedValue = summary.totalAssessedValue.plus(toDecimal(stats.eav) ?? 0);
          summary.totalFullTimeEmployees += stats.full_emp ?? 0;
          summary.totalPartTimeEmployees += stats.part_emp ?? 0;
          if (toFlag(stats.home_rule) === true) summary.homeRuleCount += 1;
          if (toFlag(stats.debt) === true) summary.entitiesWithDebt += 1;
        }

        summary.entityTypeCount = entityTypes.size;
        return summary;
      });
    },

    rankEntities(query) {
      return withIndex((idx) => {
        const candidates: { unit: UnitDataRow; value: Decimal }[] = [];
        for (const unit of idx.units) {
          if (query.entityType !== undefined && !lowerEquals(unit.description, query.entityType)) {
            continue;
          }
          if (query.county !== undefined && !lowerEquals(unit.county, query.county)) {
            continue;
          }
          const stats = idx.statsByCode.get(unit.code);
          const value = stats === undefined ? null : metricValue(stats, query.metric);
          if (value !== null) {
            candidates.push({ unit, value });
          }
        }

        const sign = query.order === 'top' ? -1 : 1;
        candidates.sort(
          (a, b) =>
            sign * a.value.comparedTo(b.value) || compareText(a.unit.unit_name, b.unit.unit_name)
        );

        const ranked: RankedEntity[] = [];
        let previous: RankedEntity | undefined;
        candidates.forEach((candidate, position) => {
          const rank =
            previous !== undefined && previous.value.equals(candidate.value)
              ? previous.rank
              : position + 1;
          previous = { ...toEntitySummary(candidate.unit, codes), rank, value: candidate.value };
          ranked.push(previous);
        });

        return ranked.slice(0, query.limit);
      });
    },

    findPeers(query) {
      return withIndex((idx) => {
        const lower = query.population * (1 - query.populationRange);
        const upper = query.population * (1 + query.populationRange);

        const peers: PeerEntity[] = [];
        for (const unit of idx.units) {
          if (unit.code === query.code) continue;
          if (query.entityType !== null && !lowerEquals(unit.description, query.entityType)) {
            continue;
          }
          const stats = idx.statsByCode.get(unit.code);
          const population = stats?.pop ?? null;
          if (population === null || population < lower || population > upper) continue;

          peers.push({
            ...toEntitySummary(unit, codes),
            population,
            assessedValue: toDecimal(stats?.eav),
            populationDifference: Math.abs(population - query.population),
          });
        }

        return peers
          .sort(
            (a, b) => a.populationDifference - b.populationDifference || compareText(a.name, b.name)
          )
          .slice(0, query.limit);
      });
    },
  };
};
