/**
 * JSON view of a fiscal health report. Ratios keep full precision; the
 * rating sits beside its value and a metric that cannot be computed is null.
 */

import { toAmount } from '../../../common/utils/amounts.js';

import type { FiscalHealthResult } from './usecases/get-fiscal-health.js';
import type { RatedMetric } from './types.js';

const toRatedMetricDto = <R extends string>(metric: RatedMetric<R> | null) =>
  metric === null ? null : { value: metric.value.toNumber(), rating: metric.rating };

export const toFiscalHealthDto = ({ entity, report }: FiscalHealthResult) => ({
  entity: {
    code: entity.code,
    name: entity.name,
    entityType: entity.entityType,
    county: entity.county,
  },
  totals: {
    revenue: report.totals.revenue.toNumber(),
    expenditure: report.totals.expenditure.toNumber(),
    unassignedFundBalance: report.totals.unassignedFundBalance.toNumber(),
    debt: report.totals.debt.toNumber(),
    population: report.totals.population,
    assessedValue: toAmount(report.totals.assessedValue),
  },
  operatingMargin: toRatedMetricDto(report.operatingMargin),
  fundBalanceRatio: toRatedMetricDto(report.fundBalanceRatio),
  debtPerCapita: toRatedMetricDto(report.debtPerCapita),
  pensionFundedRatio: toRatedMetricDto(report.pensionFundedRatio),
  revenuePerCapita: toAmount(report.revenuePerCapita),
  expenditurePerCapita: toAmount(report.expenditurePerCapita),
});

export type FiscalHealthDto = ReturnType<typeof toFiscalHealthDto>;
