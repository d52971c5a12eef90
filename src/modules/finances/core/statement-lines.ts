/**
 * Pure helpers turning stored fund lines into statement lines.
 */

import { Decimal } from 'decimal.js';

import { FUND_KEYS, type FundLine } from '../../fiscal-data/core/types.js';

import type { FundTotals, StatementLine } from './types.js';

const ZERO = new Decimal(0);

export const zeroFundTotals = (): FundTotals => ({
  general: ZERO,
  specialRevenue: ZERO,
  capitalProjects: ZERO,
  debtService: ZERO,
  enterprise: ZERO,
  trust: ZERO,
  fiduciary: ZERO,
});

export const categoryLabel = (labels: Record<string, string>, code: string): string =>
  labels[code] ?? code;

export const toStatementLine = (
  line: FundLine,
  labels: Record<string, string>
): StatementLine => {
  const amounts = zeroFundTotals();
  let total = ZERO;
  for (const key of FUND_KEYS) {
    const amount = line.amounts[key] ?? ZERO;
    amounts[key] = amount;
    total = total.plus(amount);
  }
  return { category: line.category, label: categoryLabel(labels, line.category), amounts, total };
};

export const sumStatementLines = (
  lines: readonly StatementLine[]
): { fundTotals: FundTotals; total: Decimal } => {
  const fundTotals = zeroFundTotals();
  let total = ZERO;
  for (const line of lines) {
    for (const key of FUND_KEYS) {
      fundTotals[key] = fundTotals[key].plus(line.amounts[key]);
    }
    total = total.plus(line.total);
  }
  return { fundTotals, total };
};
