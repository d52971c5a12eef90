/**
 * Fiscal Health REST Routes
 *
 * - GET /api/v1/entity/fiscal-health?code=: Ratios and ratings of one entity
 */

import { FiscalHealthResponseSchema } from './schemas.js';
import {
  EntityCodeQuerySchema,
  QUERY_ERROR_RESPONSES,
  type EntityCodeQuery,
} from '../../../../common/schemas/base.js';
import { sendQueryError } from '../../../../infra/http/replies.js';
import { toFiscalHealthDto } from '../../core/dto.js';
import { getFiscalHealth } from '../../core/usecases/get-fiscal-health.js';

import type { FiscalDataRepository } from '../../../fiscal-data/core/ports.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeFiscalHealthRoutesDeps {
  fiscalDataRepo: FiscalDataRepository;
}

export const makeFiscalHealthRoutes = (deps: MakeFiscalHealthRoutesDeps): FastifyPluginAsync => {
  const { fiscalDataRepo } = deps;

  return async (fastify) => {
    fastify.get<{ Querystring: EntityCodeQuery }>(
      '/api/v1/entity/fiscal-health',
      {
        schema: {
          querystring: EntityCodeQuerySchema,
          response: { 200: FiscalHealthResponseSchema, ...QUERY_ERROR_RESPONSES },
        },
      },
      async (request, reply) => {
        const result = await getFiscalHealth({ fiscalDataRepo }, request.query.code);

        if (result.isErr()) {
          return sendQueryError(reply, result.error);
        }
        return reply.status(200).send({ ok: true, data: toFiscalHealthDto(result.value) });
      }
    );
  };
};
