/**
 * Fiscal Health - Domain Types
 */

import type { FundKey } from '../../fiscal-data/core/types.js';
import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Input
// ─────────────────────────────────────────────────────────────────────────────

/** Per-fund sub-totals; a missing or null fund counts as zero */
export type FundBreakdown = Partial<Record<FundKey, Decimal | null>>;

export interface DebtBreakdown {
  longTerm?: Decimal | null;
  shortTerm?: Decimal | null;
}

export const PENSION_RATIO_KEYS = ['general', 'police', 'fire'] as const;

export type PensionRatioKey = (typeof PENSION_RATIO_KEYS)[number];

/**
 * Funded ratios in percent. Zero means the entity has no such system,
 * not that the system is unfunded.
 */
export type PensionFundedRatios = Partial<Record<PensionRatioKey, Decimal | null>>;

/**
 * Financial inputs of one entity for one reporting year.
 */
export interface EntityFinancials {
  entityId: string;
  population: number | null;
  assessedValue: Decimal | null;
  revenue: FundBreakdown;
  expenditure: FundBreakdown;
  unassignedFundBalance: Decimal | null;
  debt: DebtBreakdown;
  pensionFundedRatios: PensionFundedRatios;
}

// ─────────────────────────────────────────────────────────────────────────────
// Output
// ─────────────────────────────────────────────────────────────────────────────

export type PerformanceRating = 'Excellent' | 'Good' | 'Fair' | 'Poor';
export type PensionRating = 'Excellent' | 'Good' | 'Fair' | 'Critical';
export type DebtRating = 'Low' | 'Moderate' | 'High' | 'Very High';

/**
 * A ratio together with its rating. Metrics that cannot be computed are
 * null as a whole, so a rating never exists without its value.
 */
export interface RatedMetric<R extends string> {
  value: Decimal;
  rating: R;
}

export interface FiscalHealthTotals {
  revenue: Decimal;
  expenditure: Decimal;
  unassignedFundBalance: Decimal;
  debt: Decimal;
  population: number | null;
  assessedValue: Decimal | null;
}

export interface FiscalHealthReport {
  entityId: string;
  totals: FiscalHealthTotals;
  /** (revenue − expenditure) / revenue */
  operatingMargin: RatedMetric<PerformanceRating> | null;
  /** unassigned fund balance / expenditure */
  fundBalanceRatio: RatedMetric<PerformanceRating> | null;
  /** dollars of debt per resident */
  debtPerCapita: RatedMetric<DebtRating> | null;
  /** weakest reported pension system, in percent */
  pensionFundedRatio: RatedMetric<PensionRating> | null;
  revenuePerCapita: Decimal | null;
  expenditurePerCapita: Decimal | null;
}
