/**
 * Use case: can the service answer fiscal data queries right now?
 *
 * Every checker runs, concurrently. A checker that throws counts as a failed
 * check under its own name. Readiness is `unhealthy` when a critical check
 * failed, `degraded` when only non-critical ones did.
 */

import type { HealthChecker } from '../ports.js';
import type {
  DataSourceSummary,
  HealthCheckResult,
  ReadinessResponse,
  ReadinessStatus,
} from '../types.js';

export interface GetReadinessDeps {
  checkers: readonly HealthChecker[];
  dataSource?: DataSourceSummary | undefined;
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

const runCheck = async (checker: HealthChecker): Promise<HealthCheckResult> => {
  const { name } = checker;
  const critical = checker.critical ?? true;

  try {
    const outcome = await checker.check();
    return {
      name,
      status: outcome.healthy ? 'healthy' : 'unhealthy',
      ...(outcome.message !== undefined && { message: outcome.message }),
      ...(outcome.latencyMs !== undefined && { latencyMs: outcome.latencyMs }),
      critical,
    };
  } catch (error) {
    return {
      name,
      status: 'unhealthy',
      message: error instanceof Error ? error.message : 'Check failed',
      critical,
    };
  }
};

const toReadinessStatus = (checks: readonly HealthCheckResult[]): ReadinessStatus => {
  const failed = checks.filter((check) => check.status === 'unhealthy');
  if (failed.length === 0) {
    return 'ok';
  }
  return failed.some((check) => check.critical) ? 'unhealthy' : 'degraded';
};

export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const checks = await Promise.all(deps.checkers.map(runCheck));

  return {
    status: toReadinessStatus(checks),
    timestamp: input.timestamp,
    uptime: input.uptime,
    ...(deps.version !== undefined && { version: deps.version }),
    ...(deps.dataSource !== undefined && { dataSource: deps.dataSource }),
    checks,
  };
}
