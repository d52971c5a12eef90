import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import {
  computeHealth,
  DEBT_PER_CAPITA_SCALE,
  FUND_BALANCE_SCALE,
  lowestPensionRatio,
  OPERATING_MARGIN_SCALE,
  PENSION_FUNDED_SCALE,
  rate,
  safeDivide,
  totalOfFunds,
} from '@/modules/fiscal-health/index.js';

import { makeFinancials } from '../../fixtures/builders.js';

const d = (value: string | number) => new Decimal(value);

describe('safeDivide', () => {
  it('divides by a nonzero denominator', () => {
    expect(safeDivide(d(10), 4)?.toString()).toBe('2.5');
    expect(safeDivide(d(10), d(-4))?.toString()).toBe('-2.5');
  });

  it('returns null for a zero or missing denominator', () => {
    expect(safeDivide(d(10), 0)).toBeNull();
    expect(safeDivide(d(10), d(0))).toBeNull();
    expect(safeDivide(d(10), null)).toBeNull();
    expect(safeDivide(d(10), undefined)).toBeNull();
  });
});

describe('totalOfFunds', () => {
  it('sums present funds and ignores null or missing ones', () => {
    const total = totalOfFunds({ general: d(100), specialRevenue: null, enterprise: d('50.25') });
    expect(total.toString()).toBe('150.25');
  });

  it('is zero for an empty breakdown', () => {
    expect(totalOfFunds({}).isZero()).toBe(true);
  });
});

describe('lowestPensionRatio', () => {
  it('picks the weakest reported system', () => {
    expect(lowestPensionRatio({ general: d(75), police: d(65), fire: d(90) })?.toString()).toBe(
      '65'
    );
  });

  it('treats zero as not reported', () => {
    expect(lowestPensionRatio({ general: d(0), police: d(55) })?.toString()).toBe('55');
  });

  it('is null when no system is reported', () => {
    expect(lowestPensionRatio({})).toBeNull();
    expect(lowestPensionRatio({ general: d(0), police: null })).toBeNull();
  });
});

describe('rating scales', () => {
  it.each([
    ['0.05', 'Excellent'],
    ['0.049999', 'Good'],
    ['0', 'Good'],
    ['-0.05', 'Fair'],
    ['-0.0501', 'Poor'],
  ])('rates an operating margin of %s as %s', (value, expected) => {
    expect(rate(d(value), OPERATING_MARGIN_SCALE)).toBe(expected);
  });

  it.each([
    ['0.25', 'Excellent'],
    ['0.15', 'Good'],
    ['0.08', 'Fair'],
    ['0.0799', 'Poor'],
  ])('rates a fund balance ratio of %s as %s', (value, expected) => {
    expect(rate(d(value), FUND_BALANCE_SCALE)).toBe(expected);
  });

  it.each([
    ['1000', 'Low'],
    ['1000.01', 'Moderate'],
    ['2500', 'Moderate'],
    ['5000', 'High'],
    ['5000.01', 'Very High'],
  ])('rates debt per capita of %s as %s', (value, expected) => {
    expect(rate(d(value), DEBT_PER_CAPITA_SCALE)).toBe(expected);
  });

  it.each([
    ['80', 'Excellent'],
    ['60', 'Good'],
    ['40', 'Fair'],
    ['39.99', 'Critical'],
  ])('rates a funded ratio of %s as %s', (value, expected) => {
    expect(rate(d(value), PENSION_FUNDED_SCALE)).toBe(expected);
  });
});

describe('computeHealth', () => {
  it('computes every indicator for a complete entity', () => {
    const report = computeHealth(
      makeFinancials({ pensionFundedRatios: { general: d(75), police: d(65) } })
    );

    expect(report.entityId).toBe('test-entity');
    expect(report.totals.revenue.toString()).toBe('180000000');
    expect(report.totals.expenditure.toString()).toBe('170000000');
    expect(report.totals.debt.toString()).toBe('50000000');

    expect(report.operatingMargin?.value.toFixed(4)).toBe('0.0556');
    expect(report.operatingMargin?.rating).toBe('Excellent');
    expect(report.fundBalanceRatio?.value.toFixed(4)).toBe('0.1765');
    expect(report.fundBalanceRatio?.rating).toBe('Good');
    expect(report.debtPerCapita?.value.toFixed(2)).toBe('769.23');
    expect(report.debtPerCapita?.rating).toBe('Low');
    expect(report.pensionFundedRatio?.value.toString()).toBe('65');
    expect(report.pensionFundedRatio?.rating).toBe('Good');
    expect(report.revenuePerCapita?.toFixed(2)).toBe('2769.23');
    expect(report.expenditurePerCapita?.toFixed(2)).toBe('2615.38');
  });

  it('leaves margin null when there is no revenue', () => {
    const report = computeHealth(makeFinancials({ revenue: {} }));

    expect(report.totals.revenue.isZero()).toBe(true);
    expect(report.operatingMargin).toBeNull();
  });

  it('leaves the fund balance ratio null when there is no expenditure', () => {
    const report = computeHealth(makeFinancials({ expenditure: { general: d(0) } }));

    expect(report.fundBalanceRatio).toBeNull();
  });

  it('counts a missing unassigned balance as zero', () => {
    const report = computeHealth(makeFinancials({ unassignedFundBalance: null }));

    expect(report.totals.unassignedFundBalance.isZero()).toBe(true);
    expect(report.fundBalanceRatio?.value.isZero()).toBe(true);
    expect(report.fundBalanceRatio?.rating).toBe('Poor');
  });

  it.each([null, 0])('leaves per-capita figures null for population %s', (population) => {
    const report = computeHealth(makeFinancials({ population }));

    expect(report.debtPerCapita).toBeNull();
    expect(report.revenuePerCapita).toBeNull();
    expect(report.expenditurePerCapita).toBeNull();
  });

  it('adds long-term and short-term debt, each missing part as zero', () => {
    const report = computeHealth(
      makeFinancials({ population: 1000, debt: { longTerm: null, shortTerm: d(2500000) } })
    );

    expect(report.totals.debt.toString()).toBe('2500000');
    expect(report.debtPerCapita?.value.toString()).toBe('2500');
    expect(report.debtPerCapita?.rating).toBe('Moderate');
  });

  it('rates a deficit over five percent as poor', () => {
    const report = computeHealth(
      makeFinancials({ revenue: { general: d(100) }, expenditure: { general: d(110) } })
    );

    expect(report.operatingMargin?.value.toString()).toBe('-0.1');
    expect(report.operatingMargin?.rating).toBe('Poor');
  });

  it('divides negative revenue like any other nonzero denominator', () => {
    const report = computeHealth(
      makeFinancials({ revenue: { general: d(-100) }, expenditure: { general: d(50) } })
    );

    expect(report.operatingMargin?.value.toString()).toBe('1.5');
  });

  it('reports no pension indicator when every ratio is zero', () => {
    const report = computeHealth(
      makeFinancials({ pensionFundedRatios: { general: d(0), police: d(0), fire: d(0) } })
    );

    expect(report.pensionFundedRatio).toBeNull();
  });

  it('keeps the one nonzero pension ratio and rates it', () => {
    const report = computeHealth(
      makeFinancials({ pensionFundedRatios: { general: d(0), police: d(75), fire: d(0) } })
    );

    expect(report.pensionFundedRatio?.value.toString()).toBe('75');
    expect(report.pensionFundedRatio?.rating).toBe('Good');
  });

  it('computes nothing for an entity with all-zero figures', () => {
    const report = computeHealth(
      makeFinancials({
        population: 0,
        revenue: { general: d(0) },
        expenditure: { general: d(0) },
        unassignedFundBalance: d(0),
        debt: { longTerm: d(0), shortTerm: d(0) },
        pensionFundedRatios: {},
      })
    );

    expect(report.totals.revenue.isZero()).toBe(true);
    expect(report.totals.expenditure.isZero()).toBe(true);
    expect(report.totals.debt.isZero()).toBe(true);
    expect(report.operatingMargin).toBeNull();
    expect(report.fundBalanceRatio).toBeNull();
    expect(report.debtPerCapita).toBeNull();
    expect(report.pensionFundedRatio).toBeNull();
    expect(report.revenuePerCapita).toBeNull();
    expect(report.expenditurePerCapita).toBeNull();
  });

  it('returns the same report for the same input', () => {
    const financials = makeFinancials({ pensionFundedRatios: { fire: d(45) } });

    expect(computeHealth(financials)).toEqual(computeHealth(financials));
  });
});
