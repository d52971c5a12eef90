/**
 * Health module exports
 */

export { makeHealthRoutes, type MakeHealthRoutesDeps } from './shell/rest/routes.js';

export { getReadiness, type GetReadinessDeps } from './core/usecases/get-readiness.js';

export {
  makeDbHealthChecker,
  makeSnapshotHealthChecker,
  type DbHealthCheckerOptions,
  type SnapshotLoader,
  type SnapshotHealthCheckerOptions,
} from './shell/checkers/index.js';

export type { HealthChecker } from './core/ports.js';
export type {
  CheckOutcome,
  DataSourceSummary,
  HealthCheckResult,
  LivenessResponse,
  ReadinessResponse,
  ReadinessStatus,
} from './core/types.js';
