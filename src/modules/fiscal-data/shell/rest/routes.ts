/**
 * Fiscal Data REST Routes
 *
 * - GET /api/v1/tables: Which store backs the API and which tables it holds
 */

import { Type } from '@sinclair/typebox';

import { okEnvelope } from '../../../../common/schemas/base.js';

import type { FiscalDataRepository } from '../../core/ports.js';
import type { FastifyPluginAsync } from 'fastify';

const TablesResponseSchema = okEnvelope(
  Type.Object({
    source: Type.Union([Type.Literal('warehouse'), Type.Literal('snapshot')]),
    location: Type.String({ description: 'Database host or snapshot file path' }),
    tables: Type.Array(Type.String()),
  })
);

export interface MakeFiscalDataRoutesDeps {
  fiscalDataRepo: FiscalDataRepository;
}

export const makeFiscalDataRoutes = (deps: MakeFiscalDataRoutesDeps): FastifyPluginAsync => {
  return async (fastify) => {
    fastify.get(
      '/api/v1/tables',
      { schema: { response: { 200: TablesResponseSchema } } },
      async (_request, reply) => {
        return reply.status(200).send({ ok: true, data: deps.fiscalDataRepo.describe() });
      }
    );
  };
};
