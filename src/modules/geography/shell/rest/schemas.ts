/**
 * Geography Module REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import { AmountSchema, Nullable, okEnvelope } from '../../../../common/schemas/base.js';

export const CountyParamsSchema = Type.Object(
  {
    county: Type.String({ minLength: 1, description: 'County name, e.g. "Cook"' }),
  },
  { additionalProperties: false }
);

export type CountyParams = Static<typeof CountyParamsSchema>;

export const CountyEntitiesQuerySchema = Type.Object(
  {
    entity_type: Type.Optional(Type.String({ description: 'e.g. "Village", "Park District"' })),
  },
  { additionalProperties: false }
);

export type CountyEntitiesQuery = Static<typeof CountyEntitiesQuerySchema>;

export const CountyEntitiesResponseSchema = okEnvelope(
  Type.Array(
    Type.Object({
      code: Type.String(),
      name: Type.String(),
      entityType: Nullable(Type.String()),
      county: Nullable(Type.String()),
      population: Nullable(Type.Integer()),
      assessedValue: AmountSchema,
      homeRule: Nullable(Type.Boolean()),
    })
  )
);

export const CountySummaryResponseSchema = okEnvelope(
  Type.Object({
    county: Type.String(),
    entityCount: Type.Integer(),
    entityTypeCount: Type.Integer(),
    totalPopulation: Type.Integer(),
    totalAssessedValue: Type.Number(),
    totalFullTimeEmployees: Type.Integer(),
    totalPartTimeEmployees: Type.Integer(),
    homeRuleCount: Type.Integer(),
    entitiesWithDebt: Type.Integer(),
  })
);
