/**
 * Geography Module REST Routes
 *
 * - GET /api/v1/counties/:county/entities: Units of a county
 * - GET /api/v1/counties/:county/summary: County aggregates
 */

import {
  CountyEntitiesQuerySchema,
  CountyEntitiesResponseSchema,
  CountyParamsSchema,
  CountySummaryResponseSchema,
  type CountyEntitiesQuery,
  type CountyParams,
} from './schemas.js';
import { QUERY_ERROR_RESPONSES } from '../../../../common/schemas/base.js';
import { sendQueryError } from '../../../../infra/http/replies.js';
import { toCountyEntityDto, toCountySummaryDto } from '../../core/dto.js';
import { getCountyEntities } from '../../core/usecases/get-county-entities.js';
import { getCountySummary } from '../../core/usecases/get-county-summary.js';

import type { FiscalDataRepository } from '../../../fiscal-data/core/ports.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeGeographyRoutesDeps {
  fiscalDataRepo: FiscalDataRepository;
}

export const makeGeographyRoutes = (deps: MakeGeographyRoutesDeps): FastifyPluginAsync => {
  const { fiscalDataRepo } = deps;

  return async (fastify) => {
    fastify.get<{ Params: CountyParams; Querystring: CountyEntitiesQuery }>(
      '/api/v1/counties/:county/entities',
      {
        schema: {
          params: CountyParamsSchema,
          querystring: CountyEntitiesQuerySchema,
          response: { 200: CountyEntitiesResponseSchema, ...QUERY_ERROR_RESPONSES },
        },
      },
      async (request, reply) => {
        const result = await getCountyEntities(
          { fiscalDataRepo },
          { county: request.params.county, entityType: request.query.entity_type }
        );

        if (result.isErr()) {
          return sendQueryError(reply, result.error);
        }
        return reply.status(200).send({ ok: true, data: result.value.map(toCountyEntityDto) });
      }
    );

    fastify.get<{ Params: CountyParams }>(
      '/api/v1/counties/:county/summary',
      {
        schema: {
          params: CountyParamsSchema,
          response: { 200: CountySummaryResponseSchema, ...QUERY_ERROR_RESPONSES },
        },
      },
      async (request, reply) => {
        const result = await getCountySummary({ fiscalDataRepo }, request.params.county);

        if (result.isErr()) {
          return sendQueryError(reply, result.error);
        }
        return reply.status(200).send({ ok: true, data: toCountySummaryDto(result.value) });
      }
    );
  };
};
