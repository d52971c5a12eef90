/**
 * Fiscal Data Module - Domain Types
 *
 * Records read from the annual financial reports filed by Illinois units of
 * local government. Money is carried as Decimal; a null amount means the
 * report left the cell empty.
 */

import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Governmental fund categories reported for every revenue/expenditure line */
export const FUND_KEYS = [
  'general',
  'specialRevenue',
  'capitalProjects',
  'debtService',
  'enterprise',
  'trust',
  'fiduciary',
] as const;

export type FundKey = (typeof FUND_KEYS)[number];

/** Debt instruments tracked on the indebtedness schedule */
export const DEBT_INSTRUMENTS = [
  'generalObligationBonds',
  'revenueBonds',
  'alternateRevenueBonds',
  'contractual',
  'other',
] as const;

export type DebtInstrument = (typeof DEBT_INSTRUMENTS)[number];

/** Retirement systems reported on the pension schedule */
export const PENSION_SYSTEMS = ['imrf', 'police', 'fire'] as const;

export type PensionSystem = (typeof PENSION_SYSTEMS)[number];

export const RANK_METRICS = ['population', 'eav', 'employees'] as const;

export type RankMetric = (typeof RANK_METRICS)[number];

export type RankOrder = 'top' | 'bottom';

// ─────────────────────────────────────────────────────────────────────────────
// Entities
// ─────────────────────────────────────────────────────────────────────────────

export interface EntitySummary {
  /** Composite administrative code, e.g. "016/020/32" */
  code: string;
  name: string;
  entityType: string | null;
  county: string | null;
}

export interface Official {
  firstName: string | null;
  lastName: string | null;
  title: string | null;
}

export interface EntityDetails extends EntitySummary {
  entityTypeCode: number | null;
  ceo: Official | null;
  cfo: Official | null;
  population: number | null;
  /** Equalized assessed valuation */
  assessedValue: Decimal | null;
  fullTimeEmployees: number | null;
  partTimeEmployees: number | null;
  homeRule: boolean | null;
  hasDebt: boolean | null;
  hasBondedDebt: boolean | null;
}

export interface CountyEntity extends EntitySummary {
  population: number | null;
  assessedValue: Decimal | null;
  homeRule: boolean | null;
}

export interface CountySummary {
  county: string;
  entityCount: number;
  entityTypeCount: number;
  totalPopulation: number;
  totalAssessedValue: Decimal;
  totalFullTimeEmployees: number;
  totalPartTimeEmployees: number;
  homeRuleCount: number;
  entitiesWithDebt: number;
}

export interface RankQuery {
  metric: RankMetric;
  order: RankOrder;
  entityType?: string | undefined;
  county?: string | undefined;
  limit: number;
}

export interface RankedEntity extends EntitySummary {
  /** Competition rank: tied values share a rank and the next rank is skipped */
  rank: number;
  value: Decimal;
}

export interface PeerQuery {
  code: string;
  population: number;
  /** Restrict to this entity type; null matches entities of any type */
  entityType: string | null;
  /** Allowed deviation from `population`, as a fraction (0.25 = ±25%) */
  populationRange: number;
  limit: number;
}

export interface PeerEntity extends EntitySummary {
  population: number;
  assessedValue: Decimal | null;
  populationDifference: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Financial statements
// ─────────────────────────────────────────────────────────────────────────────

export type FundAmounts = Record<FundKey, Decimal | null>;

/** One category row (e.g. 201t Property Taxes) broken down by fund */
export interface FundLine {
  category: string;
  amounts: FundAmounts;
}

export interface FundBalanceLine extends FundLine {
  debtPrincipal: Decimal | null;
}

export interface IndebtednessRecord {
  /** Total long-term debt outstanding (t404) */
  longTerm: Decimal | null;
  /** Total short-term debt outstanding (t410) */
  shortTerm: Decimal | null;
  beginningBalances: Record<DebtInstrument, Decimal | null>;
}

export interface PensionRecord {
  system: PensionSystem;
  totalLiability: Decimal | null;
  planAssets: Decimal | null;
  /** Funded ratio as a percentage (0–100+) */
  fundedRatio: Decimal | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Reference vocabulary
// ─────────────────────────────────────────────────────────────────────────────

export interface ReferenceCodes {
  fundTypes: Record<string, string>;
  revenueCategories: Record<string, string>;
  expenditureCategories: Record<string, string>;
  fundBalanceCategories: Record<string, string>;
  debtInstruments: Record<DebtInstrument, string>;
  pensionSystems: Record<PensionSystem, string>;
  entityTypes: Record<string, string>;
  counties: string[];
}

export interface DataSourceDescription {
  source: 'warehouse' | 'snapshot';
  location: string;
  tables: string[];
}
