/**
 * Finances Module REST API - TypeBox Schemas
 */

import { Type } from '@sinclair/typebox';

import {
  AmountSchema,
  EntitySummarySchema,
  okEnvelope,
} from '../../../../common/schemas/base.js';

const FundTotalsSchema = Type.Object({
  general: Type.Number(),
  specialRevenue: Type.Number(),
  capitalProjects: Type.Number(),
  debtService: Type.Number(),
  enterprise: Type.Number(),
  trust: Type.Number(),
  fiduciary: Type.Number(),
});

const StatementLineSchema = Type.Object({
  category: Type.String({ description: 'Category code, e.g. "201t"' }),
  label: Type.String(),
  amounts: FundTotalsSchema,
  total: Type.Number(),
});

export const FundStatementResponseSchema = okEnvelope(
  Type.Object({
    entity: EntitySummarySchema,
    lines: Type.Array(StatementLineSchema),
    fundTotals: FundTotalsSchema,
    total: Type.Number(),
  })
);

export const FundBalanceStatementResponseSchema = okEnvelope(
  Type.Object({
    entity: EntitySummarySchema,
    lines: Type.Array(
      Type.Composite([StatementLineSchema, Type.Object({ debtPrincipal: Type.Number() })])
    ),
    unassigned: Type.Number({ description: 'General-fund Unassigned (307t) balance' }),
  })
);

export const DebtStatementResponseSchema = okEnvelope(
  Type.Object({
    entity: EntitySummarySchema,
    reported: Type.Boolean(),
    longTerm: Type.Number(),
    shortTerm: Type.Number(),
    total: Type.Number(),
    perCapita: AmountSchema,
    instruments: Type.Array(
      Type.Object({
        instrument: Type.String(),
        label: Type.String(),
        beginningBalance: Type.Number(),
      })
    ),
  })
);

export const PensionStatementResponseSchema = okEnvelope(
  Type.Object({
    entity: EntitySummarySchema,
    systems: Type.Array(
      Type.Object({
        system: Type.String(),
        label: Type.String(),
        totalLiability: Type.Number(),
        planAssets: AmountSchema,
        netLiability: AmountSchema,
        fundedRatio: AmountSchema,
      })
    ),
    totalLiability: Type.Number(),
  })
);
