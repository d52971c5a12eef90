/**
 * Health routes
 *
 * `/health/live` answers while the process runs and never touches fiscal
 * data. `/health/ready` runs the data-source checkers and reports which
 * source is being served; it answers 503 when a critical one fails.
 */

import {
  LivenessResponseSchema,
  ReadinessResponseSchema,
  type LivenessResponse,
  type ReadinessResponse,
} from '../../core/types.js';
import { getReadiness, type GetReadinessDeps } from '../../core/usecases/get-readiness.js';

import type { FastifyPluginAsync } from 'fastify';

export type MakeHealthRoutesDeps = Partial<GetReadinessDeps>;

export const makeHealthRoutes = (deps: MakeHealthRoutesDeps = {}): FastifyPluginAsync => {
  const readinessDeps: GetReadinessDeps = {
    checkers: deps.checkers ?? [],
    dataSource: deps.dataSource,
    version: deps.version,
  };
  const registeredAt = Date.now();

  return async (fastify) => {
    fastify.get<{ Reply: LivenessResponse }>(
      '/health/live',
      { schema: { response: { 200: LivenessResponseSchema } } },
      async (_request, reply) => {
        return reply.status(200).send({ status: 'ok' });
      }
    );

    fastify.get<{ Reply: ReadinessResponse }>(
      '/health/ready',
      { schema: { response: { 200: ReadinessResponseSchema, 503: ReadinessResponseSchema } } },
      async (_request, reply) => {
        const readiness = await getReadiness(readinessDeps, {
          uptime: Math.floor((Date.now() - registeredAt) / 1000),
          timestamp: new Date().toISOString(),
        });

        if (readiness.status === 'unhealthy') {
          reply.log.warn(
            { failed: readiness.checks.filter((check) => check.status === 'unhealthy') },
            'Service not ready'
          );
          return reply.status(503).send(readiness);
        }
        return reply.status(200).send(readiness);
      }
    );
  };
};
