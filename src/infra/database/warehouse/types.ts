// Warehouse tables mirror the Comptroller's annual financial report export

import type { ColumnType } from 'kysely';

// NUMERIC columns are returned by pg as strings to preserve precision
export type Numeric = ColumnType<string | null, string | number | null, string | number | null>;

// Y/N flags as stored in the export
export type YesNoFlag = string | null;

// Unit Data Table
export interface UnitData {
  code: string;
  unit_name: string;
  description: string | null;
  county: string | null;
  unit_type: number | null;
  ceo_first_name: string | null;
  ceo_last_name: string | null;
  ceo_title: string | null;
  cfo_first_name: string | null;
  cfo_last_name: string | null;
  cfo_title: string | null;
}

// Unit Stats Table
export interface UnitStats {
  code: string;
  pop: number | null;
  eav: Numeric;
  full_emp: number | null;
  part_emp: number | null;
  home_rule: YesNoFlag;
  debt: YesNoFlag;
  bonded_debt: YesNoFlag;
}

// Revenues / Expenditures Tables (one row per category, one column per fund type)
export interface FundLines {
  code: string;
  category: string;
  gn: Numeric;
  sr: Numeric;
  cp: Numeric;
  ds: Numeric;
  ep: Numeric;
  ts: Numeric;
  fd: Numeric;
}

// Fund Balances Table
export interface FundBalances extends FundLines {
  dp: Numeric;
}

// Indebtedness Table
export interface Indebtedness {
  code: string;
  t404: Numeric;
  t410: Numeric;
  a401: Numeric;
  b401: Numeric;
  c401: Numeric;
  d401: Numeric;
  e401: Numeric;
}

// Pensions Table (t501 total liability, t502 plan assets, t504 funded ratio)
export interface Pensions {
  code: string;
  imrf_t501_3: Numeric;
  imrf_t502_3: Numeric;
  imrf_t504_3: Numeric;
  police_t501_3: Numeric;
  police_t502_3: Numeric;
  police_t504_3: Numeric;
  fire_t501_3: Numeric;
  fire_t502_3: Numeric;
  fire_t504_3: Numeric;
}

export interface WarehouseDatabase {
  unit_data: UnitData;
  unit_stats: UnitStats;
  revenues: FundLines;
  expenditures: FundLines;
  fund_balances: FundBalances;
  indebtedness: Indebtedness;
  pensions: Pensions;
}

export const WAREHOUSE_TABLES = [
  'unit_data',
  'unit_stats',
  'revenues',
  'expenditures',
  'fund_balances',
  'indebtedness',
  'pensions',
] as const satisfies readonly (keyof WarehouseDatabase)[];
