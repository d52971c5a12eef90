/**
 * Entities Module REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import {
  AmountSchema,
  EntitySummarySchema,
  Nullable,
  okEnvelope,
} from '../../../../common/schemas/base.js';
import { MAX_RANK_LIMIT, MAX_SEARCH_LIMIT } from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const SearchEntitiesQuerySchema = Type.Object(
  {
    q: Type.String({ description: 'Name or county fragment (min 2 characters)' }),
    limit: Type.Optional(Type.Integer({ minimum: 1, maximum: MAX_SEARCH_LIMIT })),
  },
  { additionalProperties: false }
);

export type SearchEntitiesQuery = Static<typeof SearchEntitiesQuerySchema>;

export const CompareEntitiesQuerySchema = Type.Object(
  {
    codes: Type.String({
      minLength: 1,
      description: 'Comma-separated entity codes (2 to 10)',
    }),
  },
  { additionalProperties: false }
);

export type CompareEntitiesQuery = Static<typeof CompareEntitiesQuerySchema>;

export const RankEntitiesQuerySchema = Type.Object(
  {
    metric: Type.Union([
      Type.Literal('population'),
      Type.Literal('eav'),
      Type.Literal('employees'),
    ]),
    order: Type.Optional(Type.Union([Type.Literal('top'), Type.Literal('bottom')])),
    entity_type: Type.Optional(Type.String()),
    county: Type.Optional(Type.String()),
    limit: Type.Optional(Type.Integer({ minimum: 1, maximum: MAX_RANK_LIMIT })),
  },
  { additionalProperties: false }
);

export type RankEntitiesQuery = Static<typeof RankEntitiesQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

const OfficialSchema = Nullable(
  Type.Object({
    firstName: Nullable(Type.String()),
    lastName: Nullable(Type.String()),
    title: Nullable(Type.String()),
  })
);

export const EntityDetailsSchema = Type.Object({
  code: Type.String(),
  name: Type.String(),
  entityType: Nullable(Type.String()),
  entityTypeCode: Nullable(Type.Integer()),
  county: Nullable(Type.String()),
  ceo: OfficialSchema,
  cfo: OfficialSchema,
  population: Nullable(Type.Integer()),
  assessedValue: AmountSchema,
  fullTimeEmployees: Nullable(Type.Integer()),
  partTimeEmployees: Nullable(Type.Integer()),
  homeRule: Nullable(Type.Boolean()),
  hasDebt: Nullable(Type.Boolean()),
  hasBondedDebt: Nullable(Type.Boolean()),
});

export type EntityDetailsDto = Static<typeof EntityDetailsSchema>;

export const SearchEntitiesResponseSchema = okEnvelope(Type.Array(EntitySummarySchema));

export const EntityDetailsResponseSchema = okEnvelope(EntityDetailsSchema);

const ComparisonRowSchema = Type.Object({
  code: Type.String(),
  name: Type.String(),
  entityType: Nullable(Type.String()),
  county: Nullable(Type.String()),
  population: Nullable(Type.Integer()),
  assessedValue: AmountSchema,
  totalRevenue: Type.Number(),
  totalExpenditure: Type.Number(),
  revenuePerCapita: AmountSchema,
  expenditurePerCapita: AmountSchema,
});

export type ComparisonRowDto = Static<typeof ComparisonRowSchema>;

export const CompareEntitiesResponseSchema = okEnvelope(
  Type.Object({
    entities: Type.Array(ComparisonRowSchema),
    notFound: Type.Array(Type.String()),
  })
);

const RankedEntitySchema = Type.Object({
  rank: Type.Integer(),
  code: Type.String(),
  name: Type.String(),
  entityType: Nullable(Type.String()),
  county: Nullable(Type.String()),
  value: Type.Number(),
});

export type RankedEntityDto = Static<typeof RankedEntitySchema>;

export const RankEntitiesResponseSchema = okEnvelope(Type.Array(RankedEntitySchema));

const PeerEntitySchema = Type.Object({
  code: Type.String(),
  name: Type.String(),
  entityType: Nullable(Type.String()),
  county: Nullable(Type.String()),
  population: Type.Integer(),
  assessedValue: AmountSchema,
  populationDifference: Type.Integer(),
});

export type PeerEntityDto = Static<typeof PeerEntitySchema>;

export const PeerGroupResponseSchema = okEnvelope(
  Type.Object({
    entity: Type.Object({
      code: Type.String(),
      name: Type.String(),
      entityType: Nullable(Type.String()),
      county: Nullable(Type.String()),
      population: Nullable(Type.Integer()),
    }),
    populationWindow: Nullable(Type.Object({ min: Type.Number(), max: Type.Number() })),
    peers: Type.Array(PeerEntitySchema),
  })
);
