/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { registerCors, registerSecurityHeaders } from '../infra/plugins/index.js';
import { makeEntityRoutes } from '../modules/entities/index.js';
import { makeFinanceRoutes } from '../modules/finances/index.js';
import {
  makeFiscalDataRoutes,
  type FiscalDataRepository,
  type ReferenceCodes,
} from '../modules/fiscal-data/index.js';
import { makeFiscalHealthRoutes } from '../modules/fiscal-health/index.js';
import { makeGeographyRoutes } from '../modules/geography/index.js';
import { makeHealthRoutes, type HealthChecker } from '../modules/health/index.js';
import { createMcpServer, makeMcpRoutes } from '../modules/mcp/index.js';

import type { AppConfig } from '../infra/config/index.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  fiscalDataRepo: FiscalDataRepository;
  referenceCodes: ReferenceCodes;
  config: AppConfig;
  healthCheckers?: HealthChecker[];
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps, version } = options;
  const { fiscalDataRepo, referenceCodes, config } = deps;

  // Create Fastify instance
  const app = fastifyLib({
    ...fastifyOptions,
  });

  // Set before any plugin so every route context inherits them
  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Handle validation errors
    if (error.validation != null) {
      request.log.debug({ err: error }, 'Request validation failed');
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'Request error');

    // Handle known HTTP errors
    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    // Handle unexpected errors
    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  await registerSecurityHeaders(app, config);
  await registerCors(app, config);

  // Register health routes
  const { source, location } = fiscalDataRepo.describe();
  await app.register(
    makeHealthRoutes({
      version,
      dataSource: { source, location },
      checkers: deps.healthCheckers ?? [],
    })
  );

  // ─────────────────────────────────────────────────────────────────────────────
  // REST API
  // ─────────────────────────────────────────────────────────────────────────────
  await app.register(makeFiscalDataRoutes({ fiscalDataRepo }));
  await app.register(makeEntityRoutes({ fiscalDataRepo }));
  await app.register(makeFinanceRoutes({ fiscalDataRepo, referenceCodes }));
  await app.register(makeFiscalHealthRoutes({ fiscalDataRepo }));
  await app.register(makeGeographyRoutes({ fiscalDataRepo }));

  // ─────────────────────────────────────────────────────────────────────────────
  // MCP over Streamable HTTP
  // ─────────────────────────────────────────────────────────────────────────────
  await makeMcpRoutes(app, {
    createServer: () => createMcpServer({ fiscalDataRepo, referenceCodes, version }),
    config: config.mcp,
  });

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
