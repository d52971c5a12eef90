/**
 * Fiscal health engine.
 *
 * Pure and total: no I/O, no shared state, and every undefined ratio
 * (missing or zero denominator, no pension data) comes back as null.
 */

import { Decimal } from 'decimal.js';

import {
  DEBT_PER_CAPITA_SCALE,
  FUND_BALANCE_SCALE,
  OPERATING_MARGIN_SCALE,
  PENSION_FUNDED_SCALE,
  rate,
  type RatingScale,
} from './thresholds.js';
import {
  PENSION_RATIO_KEYS,
  type EntityFinancials,
  type FiscalHealthReport,
  type FundBreakdown,
  type PensionFundedRatios,
  type RatedMetric,
} from './types.js';
import { FUND_KEYS } from '../../fiscal-data/core/types.js';

const ZERO = new Decimal(0);

/**
 * numerator / denominator, or null when the denominator is absent or zero.
 */
export const safeDivide = (
  numerator: Decimal,
  denominator: Decimal | number | null | undefined
): Decimal | null => {
  if (denominator === null || denominator === undefined) {
    return null;
  }
  const divisor = new Decimal(denominator);
  if (divisor.isZero()) {
    return null;
  }
  return numerator.div(divisor);
};

/**
 * Sums the values, each absent one counted as zero.
 */
export const sumCoalesced = (values: readonly (Decimal | null | undefined)[]): Decimal => {
  return values.reduce<Decimal>(
    (total, value) => (value === null || value === undefined ? total : total.plus(value)),
    ZERO
  );
};

export const totalOfFunds = (breakdown: FundBreakdown): Decimal => {
  return sumCoalesced(FUND_KEYS.map((key) => breakdown[key]));
};

/**
 * The weakest funded ratio among reported systems. Zero is "not reported".
 */
export const lowestPensionRatio = (ratios: PensionFundedRatios): Decimal | null => {
  const reported = PENSION_RATIO_KEYS.map((key) => ratios[key]).filter(
    (ratio): ratio is Decimal => ratio !== null && ratio !== undefined && !ratio.isZero()
  );
  return reported.length === 0 ? null : Decimal.min(...reported);
};

const rated = <R extends string>(
  value: Decimal | null,
  scale: RatingScale<R>
): RatedMetric<R> | null => (value === null ? null : { value, rating: rate(value, scale) });

export const computeHealth = (financials: EntityFinancials): FiscalHealthReport => {
  const revenue = totalOfFunds(financials.revenue);
  const expenditure = totalOfFunds(financials.expenditure);
  const unassignedFundBalance = financials.unassignedFundBalance ?? ZERO;
  const debt = sumCoalesced([financials.debt.longTerm, financials.debt.shortTerm]);
  const { population } = financials;

  return {
    entityId: financials.entityId,
    totals: {
      revenue,
      expenditure,
      unassignedFundBalance,
      debt,
      population,
      assessedValue: financials.assessedValue,
    },
    operatingMargin: rated(safeDivide(revenue.minus(expenditure), revenue), OPERATING_MARGIN_SCALE),
    fundBalanceRatio: rated(safeDivide(unassignedFundBalance, expenditure), FUND_BALANCE_SCALE),
    debtPerCapita: rated(safeDivide(debt, population), DEBT_PER_CAPITA_SCALE),
    pensionFundedRatio: rated(
      lowestPensionRatio(financials.pensionFundedRatios),
      PENSION_FUNDED_SCALE
    ),
    revenuePerCapita: safeDivide(revenue, population),
    expenditurePerCapita: safeDivide(expenditure, population),
  };
};
