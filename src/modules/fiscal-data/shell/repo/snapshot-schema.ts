/**
 * TypeBox schema for the YAML snapshot of the desktop report database.
 *
 * Tables and columns carry the same names as in the warehouse. Money cells
 * may be written as YAML numbers or as quoted decimal strings; quoting keeps
 * cents exact.
 */

import { Type, type Static } from '@sinclair/typebox';

const Text = Type.Optional(Type.Union([Type.String(), Type.Null()]));
const Integer = Type.Optional(Type.Union([Type.Integer(), Type.Null()]));
const Money = Type.Optional(
  Type.Union([Type.Number(), Type.String({ pattern: '^-?\\d+(\\.\\d+)?$' }), Type.Null()])
);
const Code = Type.String({ minLength: 1 });

export const UnitDataRowSchema = Type.Object({
  code: Code,
  unit_name: Type.String({ minLength: 1 }),
  description: Text,
  county: Text,
  unit_type: Integer,
  ceo_first_name: Text,
  ceo_last_name: Text,
  ceo_title: Text,
  cfo_first_name: Text,
  cfo_last_name: Text,
  cfo_title: Text,
});

export const UnitStatsRowSchema = Type.Object({
  code: Code,
  pop: Integer,
  eav: Money,
  full_emp: Integer,
  part_emp: Integer,
  home_rule: Text,
  debt: Text,
  bonded_debt: Text,
});

const fundColumns = {
  code: Code,
  category: Type.String({ minLength: 1 }),
  gn: Money,
  sr: Money,
  cp: Money,
  ds: Money,
  ep: Money,
  ts: Money,
  fd: Money,
};

export const FundLineRowSchema = Type.Object(fundColumns);

export const FundBalanceRowSchema = Type.Object({ ...fundColumns, dp: Money });

export const IndebtednessRowSchema = Type.Object({
  code: Code,
  t404: Money,
  t410: Money,
  a401: Money,
  b401: Money,
  c401: Money,
  d401: Money,
  e401: Money,
});

export const PensionRowSchema = Type.Object({
  code: Code,
  imrf_t501_3: Money,
  imrf_t502_3: Money,
  imrf_t504_3: Money,
  police_t501_3: Money,
  police_t502_3: Money,
  police_t504_3: Money,
  fire_t501_3: Money,
  fire_t502_3: Money,
  fire_t504_3: Money,
});

export const SnapshotFileSchema = Type.Object({
  reporting_year: Type.Optional(Type.Integer({ minimum: 1900 })),
  unit_data: Type.Array(UnitDataRowSchema),
  unit_stats: Type.Optional(Type.Array(UnitStatsRowSchema)),
  revenues: Type.Optional(Type.Array(FundLineRowSchema)),
  expenditures: Type.Optional(Type.Array(FundLineRowSchema)),
  fund_balances: Type.Optional(Type.Array(FundBalanceRowSchema)),
  indebtedness: Type.Optional(Type.Array(IndebtednessRowSchema)),
  pensions: Type.Optional(Type.Array(PensionRowSchema)),
});

export type SnapshotFile = Static<typeof SnapshotFileSchema>;
export type UnitDataRow = Static<typeof UnitDataRowSchema>;
export type UnitStatsRow = Static<typeof UnitStatsRowSchema>;
export type FundLineRow = Static<typeof FundLineRowSchema>;
export type FundBalanceRow = Static<typeof FundBalanceRowSchema>;
export type IndebtednessRow = Static<typeof IndebtednessRowSchema>;
export type PensionRow = Static<typeof PensionRowSchema>;

export const SNAPSHOT_TABLES = [
  'unit_data',
  'unit_stats',
  'revenues',
  'expenditures',
  'fund_balances',
  'indebtedness',
  'pensions',
] as const satisfies readonly (keyof SnapshotFile)[];
