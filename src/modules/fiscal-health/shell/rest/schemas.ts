/**
 * Fiscal Health REST API - TypeBox Schemas
 */

import { Type } from '@sinclair/typebox';

import {
  AmountSchema,
  EntitySummarySchema,
  Nullable,
  okEnvelope,
} from '../../../../common/schemas/base.js';

const ratedMetric = (ratings: readonly string[], description: string) =>
  Nullable(
    Type.Object(
      {
        value: Type.Number(),
        rating: Type.Union(ratings.map((rating) => Type.Literal(rating))),
      },
      { description }
    )
  );

const PERFORMANCE_RATINGS = ['Excellent', 'Good', 'Fair', 'Poor'] as const;

export const FiscalHealthResponseSchema = okEnvelope(
  Type.Object({
    entity: EntitySummarySchema,
    totals: Type.Object({
      revenue: Type.Number(),
      expenditure: Type.Number(),
      unassignedFundBalance: Type.Number(),
      debt: Type.Number(),
      population: Nullable(Type.Integer()),
      assessedValue: AmountSchema,
    }),
    operatingMargin: ratedMetric(PERFORMANCE_RATINGS, '(revenue - expenditure) / revenue'),
    fundBalanceRatio: ratedMetric(PERFORMANCE_RATINGS, 'unassigned fund balance / expenditure'),
    debtPerCapita: ratedMetric(['Low', 'Moderate', 'High', 'Very High'], 'debt per resident'),
    pensionFundedRatio: ratedMetric(
      ['Excellent', 'Good', 'Fair', 'Critical'],
      'weakest pension system funded ratio, percent'
    ),
    revenuePerCapita: AmountSchema,
    expenditurePerCapita: AmountSchema,
  })
);
