/**
 * Row → domain mappers shared by the warehouse and snapshot adapters.
 *
 * Both stores use the same table and column names; they differ only in how
 * NUMERIC cells arrive (string from pg, number or string from YAML).
 */

import { Decimal } from 'decimal.js';

import {
  PENSION_SYSTEMS,
  type CountyEntity,
  type EntityDetails,
  type EntitySummary,
  type FundAmounts,
  type FundBalanceLine,
  type FundLine,
  type IndebtednessRecord,
  type Official,
  type PensionRecord,
  type ReferenceCodes,
} from '../../core/types.js';

export type NumericCell = string | number | null | undefined;
type TextCell = string | null | undefined;
type IntegerCell = number | null | undefined;

export interface UnitRow {
  code: string;
  unit_name: string;
  description?: TextCell;
  county?: TextCell;
  unit_type?: IntegerCell;
}

export interface UnitContactRow {
  ceo_first_name?: TextCell;
  ceo_last_name?: TextCell;
  ceo_title?: TextCell;
  cfo_first_name?: TextCell;
  cfo_last_name?: TextCell;
  cfo_title?: TextCell;
}

export interface UnitStatsRow {
  pop?: IntegerCell;
  eav?: NumericCell;
  full_emp?: IntegerCell;
  part_emp?: IntegerCell;
  home_rule?: TextCell;
  debt?: TextCell;
  bonded_debt?: TextCell;
}

export interface FundLineRow {
  category: string;
  gn?: NumericCell;
  sr?: NumericCell;
  cp?: NumericCell;
  ds?: NumericCell;
  ep?: NumericCell;
  ts?: NumericCell;
  fd?: NumericCell;
}

export interface FundBalanceRow extends FundLineRow {
  dp?: NumericCell;
}

export interface IndebtednessRow {
  t404?: NumericCell;
  t410?: NumericCell;
  a401?: NumericCell;
  b401?: NumericCell;
  c401?: NumericCell;
  d401?: NumericCell;
  e401?: NumericCell;
}

export interface PensionRow {
  imrf_t501_3?: NumericCell;
  imrf_t502_3?: NumericCell;
  imrf_t504_3?: NumericCell;
  police_t501_3?: NumericCell;
  police_t502_3?: NumericCell;
  police_t504_3?: NumericCell;
  fire_t501_3?: NumericCell;
  fire_t502_3?: NumericCell;
  fire_t504_3?: NumericCell;
}

// ─────────────────────────────────────────────────────────────────────────────
// Cells
// ─────────────────────────────────────────────────────────────────────────────

export const toDecimal = (value: NumericCell): Decimal | null => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' && value.trim() === '') {
    return null;
  }
  return new Decimal(value);
};

/** Y/N flags; anything else is unknown */
export const toFlag = (value: TextCell): boolean | null => {
  const normalized = value?.trim().toUpperCase();
  if (normalized === 'Y') return true;
  if (normalized === 'N') return false;
  return null;
};

const toText = (value: TextCell): string | null => {
  const trimmed = value?.trim();
  return trimmed === undefined || trimmed === '' ? null : trimmed;
};

// ─────────────────────────────────────────────────────────────────────────────
// Entities
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Entity type label: the unit's own description, else the label of its type code.
 */
export const entityTypeLabel = (unit: UnitRow, codes: ReferenceCodes): string | null => {
  const description = toText(unit.description);
  if (description !== null) {
    return description;
  }
  if (unit.unit_type === null || unit.unit_type === undefined) {
    return null;
  }
  return codes.entityTypes[String(unit.unit_type)] ?? null;
};

export const toEntitySummary = (unit: UnitRow, codes: ReferenceCodes): EntitySummary => ({
  code: unit.code,
  name: unit.unit_name,
  entityType: entityTypeLabel(unit, codes),
  county: toText(unit.county),
});

const toOfficial = (
  firstName: TextCell,
  lastName: TextCell,
  title: TextCell
): Official | null => {
  const official = {
    firstName: toText(firstName),
    lastName: toText(lastName),
    title: toText(title),
  };
  return official.firstName === null && official.lastName === null && official.title === null
    ? null
    : official;
};

export const toEntityDetails = (
  unit: UnitRow & UnitContactRow,
  stats: UnitStatsRow | undefined,
  codes: ReferenceCodes
): EntityDetails => ({
  ...toEntitySummary(unit, codes),
  entityTypeCode: unit.unit_type ?? null,
  ceo: toOfficial(unit.ceo_first_name, unit.ceo_last_name, unit.ceo_title),
  cfo: toOfficial(unit.cfo_first_name, unit.cfo_last_name, unit.cfo_title),
  population: stats?.pop ?? null,
  assessedValue: toDecimal(stats?.eav),
  fullTimeEmployees: stats?.full_emp ?? null,
  partTimeEmployees: stats?.part_emp ?? null,
  homeRule: toFlag(stats?.home_rule),
  hasDebt: toFlag(stats?.debt),
  hasBondedDebt: toFlag(stats?.bonded_debt),
});

export const toCountyEntity = (
  unit: UnitRow,
  stats: UnitStatsRow | undefined,
  codes: ReferenceCodes
): CountyEntity => ({
  ...toEntitySummary(unit, codes),
  population: stats?.pop ?? null,
  assessedValue: toDecimal(stats?.eav),
  homeRule: toFlag(stats?.home_rule),
});

// ─────────────────────────────────────────────────────────────────────────────
// Statements
// ─────────────────────────────────────────────────────────────────────────────

const toFundAmounts = (row: FundLineRow): FundAmounts => ({
  general: toDecimal(row.gn),
  specialRevenue: toDecimal(row.sr),
  capitalProjects: toDecimal(row.cp),
  debtService: toDecimal(row.ds),
  enterprise: toDecimal(row.ep),
  trust: toDecimal(row.ts),
  fiduciary: toDecimal(row.fd),
});

export const toFundLine = (row: FundLineRow): FundLine => ({
  category: row.category,
  amounts: toFundAmounts(row),
});

export const toFundBalanceLine = (row: FundBalanceRow): FundBalanceLine => ({
  ...toFundLine(row),
  debtPrincipal: toDecimal(row.dp),
});

export const toIndebtedness = (row: IndebtednessRow): IndebtednessRecord => ({
  longTerm: toDecimal(row.t404),
  shortTerm: toDecimal(row.t410),
  beginningBalances: {
    generalObligationBonds: toDecimal(row.a401),
    revenueBonds: toDecimal(row.b401),
    alternateRevenueBonds: toDecimal(row.c401),
    contractual: toDecimal(row.d401),
    other: toDecimal(row.e401),
  },
});

const PENSION_CELLS = {
  imrf: ['imrf_t501_3', 'imrf_t502_3', 'imrf_t504_3'],
  police: ['police_t501_3', 'police_t502_3', 'police_t504_3'],
  fire: ['fire_t501_3', 'fire_t502_3', 'fire_t504_3'],
} as const satisfies Record<string, readonly (keyof PensionRow)[]>;

/**
 * Splits the pension row into one record per system that has any value.
 */
export const toPensionRecords = (row: PensionRow): PensionRecord[] => {
  const records: PensionRecord[] = [];
  for (const system of PENSION_SYSTEMS) {
    const [liabilityCell, assetsCell, ratioCell] = PENSION_CELLS[system];
    const record: PensionRecord = {
      system,
      totalLiability: toDecimal(row[liabilityCell]),
      planAssets: toDecimal(row[assetsCell]),
      fundedRatio: toDecimal(row[ratioCell]),
    };
    if (record.totalLiability !== null || record.planAssets !== null || record.fundedRatio !== null) {
      records.push(record);
    }
  }
  return records;
};
