/**
 * Entities Module REST Routes
 *
 * - GET /api/v1/entities/search: Search by name or county
 * - GET /api/v1/entities/compare: Side-by-side comparison
 * - GET /api/v1/entities/rank: Top or bottom entities by a metric
 * - GET /api/v1/entity: Entity details
 * - GET /api/v1/entity/peers: Comparable entities
 */

import {
  CompareEntitiesQuerySchema,
  CompareEntitiesResponseSchema,
  EntityDetailsResponseSchema,
  PeerGroupResponseSchema,
  RankEntitiesQuerySchema,
  RankEntitiesResponseSchema,
  SearchEntitiesQuerySchema,
  SearchEntitiesResponseSchema,
  type CompareEntitiesQuery,
  type RankEntitiesQuery,
  type SearchEntitiesQuery,
} from './schemas.js';
import {
  EntityCodeQuerySchema,
  QUERY_ERROR_RESPONSES,
  type EntityCodeQuery,
} from '../../../../common/schemas/base.js';
import { sendQueryError } from '../../../../infra/http/replies.js';
import {
  toComparisonDto,
  toEntityDetailsDto,
  toPeerGroupDto,
  toRankedEntityDto,
} from '../../core/dto.js';
import { compareEntities } from '../../core/usecases/compare-entities.js';
import { findPeerEntities } from '../../core/usecases/find-peer-entities.js';
import { getEntity } from '../../core/usecases/get-entity.js';
import { rankEntities } from '../../core/usecases/rank-entities.js';
import { searchEntities } from '../../core/usecases/search-entities.js';

import type { FiscalDataRepository } from '../../../fiscal-data/core/ports.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeEntityRoutesDeps {
  fiscalDataRepo: FiscalDataRepository;
}

/**
 * Creates entity lookup REST routes.
 */
export const makeEntityRoutes = (deps: MakeEntityRoutesDeps): FastifyPluginAsync => {
  const { fiscalDataRepo } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/entities/search
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: SearchEntitiesQuery }>(
      '/api/v1/entities/search',
      {
        schema: {
          querystring: SearchEntitiesQuerySchema,
          response: { 200: SearchEntitiesResponseSchema, ...QUERY_ERROR_RESPONSES },
        },
      },
      async (request, reply) => {
        const { q, limit } = request.query;
        const result = await searchEntities({ fiscalDataRepo }, { query: q, limit });

        if (result.isErr()) {
          return sendQueryError(reply, result.error);
        }
        return reply.status(200).send({ ok: true, data: result.value });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/entities/compare
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: CompareEntitiesQuery }>(
      '/api/v1/entities/compare',
      {
        schema: {
          querystring: CompareEntitiesQuerySchema,
          response: { 200: CompareEntitiesResponseSchema, ...QUERY_ERROR_RESPONSES },
        },
      },
      async (request, reply) => {
        const codes = request.query.codes.split(',');
        const result = await compareEntities({ fiscalDataRepo }, codes);

        if (result.isErr()) {
          return sendQueryError(reply, result.error);
        }
        return reply.status(200).send({ ok: true, data: toComparisonDto(result.value) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/entities/rank
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: RankEntitiesQuery }>(
      '/api/v1/entities/rank',
      {
        schema: {
          querystring: RankEntitiesQuerySchema,
          response: { 200: RankEntitiesResponseSchema, ...QUERY_ERROR_RESPONSES },
        },
      },
      async (request, reply) => {
        const { metric, order, entity_type: entityType, county, limit } = request.query;
        const result = await rankEntities(
          { fiscalDataRepo },
          { metric, order, entityType, county, limit }
        );

        if (result.isErr()) {
          return sendQueryError(reply, result.error);
        }
        return reply.status(200).send({ ok: true, data: result.value.map(toRankedEntityDto) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/entity
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: EntityCodeQuery }>(
      '/api/v1/entity',
      {
        schema: {
          querystring: EntityCodeQuerySchema,
          response: { 200: EntityDetailsResponseSchema, ...QUERY_ERROR_RESPONSES },
        },
      },
      async (request, reply) => {
        const result = await getEntity({ fiscalDataRepo }, request.query.code);

        if (result.isErr()) {
          return sendQueryError(reply, result.error);
        }
        return reply.status(200).send({ ok: true, data: toEntityDetailsDto(result.value) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/entity/peers
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: EntityCodeQuery }>(
      '/api/v1/entity/peers',
      {
        schema: {
          querystring: EntityCodeQuerySchema,
          response: { 200: PeerGroupResponseSchema, ...QUERY_ERROR_RESPONSES },
        },
      },
      async (request, reply) => {
        const result = await findPeerEntities({ fiscalDataRepo }, request.query.code);

        if (result.isErr()) {
          return sendQueryError(reply, result.error);
        }
        return reply.status(200).send({ ok: true, data: toPeerGroupDto(result.value) });
      }
    );
  };
};
