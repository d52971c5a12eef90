/**
 * MCP Module - Zod Schemas
 *
 * Tool input schemas. The MCP SDK takes the raw `.shape` of each object.
 */

import { z } from 'zod';

import { MAX_RANK_LIMIT, MAX_SEARCH_LIMIT } from '../../../entities/core/types.js';
import { RANK_METRICS } from '../../../fiscal-data/core/types.js';

const EntityCodeSchema = z
  .string()
  .min(1)
  .describe('Entity code in "county/unit/type" form, e.g. "016/020/32"');

export const EntityCodeInputZod = z.object({
  entity_code: EntityCodeSchema,
});

export const SearchEntityInputZod = z.object({
  query: z
    .string()
    .min(2)
    .describe('Entity name or county to search for, e.g. "Naperville" or "Cook"'),
  limit: z
    .number()
    .int()
    .min(1)
    .max(MAX_SEARCH_LIMIT)
    .optional()
    .describe('Maximum number of matches (default 10)'),
});

export const CompareEntitiesInputZod = z.object({
  entity_codes: z
    .array(EntityCodeSchema)
    .min(2)
    .max(10)
    .describe('Between 2 and 10 entity codes to compare'),
});

export const RankEntitiesInputZod = z.object({
  metric: z.enum(RANK_METRICS).describe('population, eav (assessed value) or employees'),
  order: z
    .enum(['top', 'bottom'])
    .optional()
    .describe('top = largest first (default), bottom = smallest first'),
  entity_type: z
    .string()
    .optional()
    .describe('Restrict to one entity type, e.g. "Village" or "Park District"'),
  county: z.string().optional().describe('Restrict to one county, e.g. "DuPage"'),
  limit: z
    .number()
    .int()
    .min(1)
    .max(MAX_RANK_LIMIT)
    .optional()
    .describe('Number of entities to return (default 10)'),
});

export const CountyEntitiesInputZod = z.object({
  county: z.string().min(1).describe('County name without the word "County", e.g. "Lake"'),
  entity_type: z
    .string()
    .optional()
    .describe('Optional entity type filter, e.g. "Fire Protection District"'),
});

export const CountySummaryInputZod = z.object({
  county: z.string().min(1).describe('County name without the word "County", e.g. "Sangamon"'),
});

export type EntityCodeInput = z.infer<typeof EntityCodeInputZod>;
export type SearchEntityInput = z.infer<typeof SearchEntityInputZod>;
export type CompareEntitiesInput = z.infer<typeof CompareEntitiesInputZod>;
export type RankEntitiesToolInput = z.infer<typeof RankEntitiesInputZod>;
export type CountyEntitiesInput = z.infer<typeof CountyEntitiesInputZod>;
