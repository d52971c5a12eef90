/**
 * Finances Module REST Routes
 *
 * Statement endpoints for one entity, addressed by `?code=`:
 * - GET /api/v1/entity/revenues
 * - GET /api/v1/entity/expenditures
 * - GET /api/v1/entity/fund-balances
 * - GET /api/v1/entity/debt
 * - GET /api/v1/entity/pensions
 */

import {
  DebtStatementResponseSchema,
  FundBalanceStatementResponseSchema,
  FundStatementResponseSchema,
  PensionStatementResponseSchema,
} from './schemas.js';
import {
  EntityCodeQuerySchema,
  QUERY_ERROR_RESPONSES,
  type EntityCodeQuery,
} from '../../../../common/schemas/base.js';
import { sendQueryError } from '../../../../infra/http/replies.js';
import {
  toDebtStatementDto,
  toFundBalanceStatementDto,
  toFundStatementDto,
  toPensionStatementDto,
} from '../../core/dto.js';
import { getDebt } from '../../core/usecases/get-debt.js';
import { getExpenditures } from '../../core/usecases/get-expenditures.js';
import { getFundBalances } from '../../core/usecases/get-fund-balances.js';
import { getPensions } from '../../core/usecases/get-pensions.js';
import { getRevenues } from '../../core/usecases/get-revenues.js';

import type { QueryError } from '../../../../common/types/errors.js';
import type { FiscalDataRepository } from '../../../fiscal-data/core/ports.js';
import type { ReferenceCodes } from '../../../fiscal-data/core/types.js';
import type { TSchema } from '@sinclair/typebox';
import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { Result } from 'neverthrow';

export interface MakeFinanceRoutesDeps {
  fiscalDataRepo: FiscalDataRepository;
  referenceCodes: ReferenceCodes;
}

/**
 * Registers one GET route that runs a statement use case for `?code=`.
 */
const registerStatementRoute = <T>(
  fastify: FastifyInstance,
  path: string,
  responseSchema: TSchema,
  run: (code: string) => Promise<Result<T, QueryError>>,
  toDto: (value: T) => unknown
): void => {
  fastify.get<{ Querystring: EntityCodeQuery }>(
    path,
    {
      schema: {
        querystring: EntityCodeQuerySchema,
        response: { 200: responseSchema, ...QUERY_ERROR_RESPONSES },
      },
    },
    async (request, reply) => {
      const result = await run(request.query.code);

      if (result.isErr()) {
        return sendQueryError(reply, result.error);
      }
      return reply.status(200).send({ ok: true, data: toDto(result.value) });
    }
  );
};

/**
 * Creates statement REST routes.
 */
export const makeFinanceRoutes = (deps: MakeFinanceRoutesDeps): FastifyPluginAsync => {
  return async (fastify) => {
    registerStatementRoute(
      fastify,
      '/api/v1/entity/revenues',
      FundStatementResponseSchema,
      (code) => getRevenues(deps, code),
      toFundStatementDto
    );

    registerStatementRoute(
      fastify,
      '/api/v1/entity/expenditures',
      FundStatementResponseSchema,
      (code) => getExpenditures(deps, code),
      toFundStatementDto
    );

    registerStatementRoute(
      fastify,
      '/api/v1/entity/fund-balances',
      FundBalanceStatementResponseSchema,
      (code) => getFundBalances(deps, code),
      toFundBalanceStatementDto
    );

    registerStatementRoute(
      fastify,
      '/api/v1/entity/debt',
      DebtStatementResponseSchema,
      (code) => getDebt(deps, code),
      toDebtStatementDto
    );

    registerStatementRoute(
      fastify,
      '/api/v1/entity/pensions',
      PensionStatementResponseSchema,
      (code) => getPensions(deps, code),
      toPensionStatementDto
    );
  };
};
