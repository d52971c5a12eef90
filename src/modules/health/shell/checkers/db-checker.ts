/**
 * Warehouse checker: the Postgres warehouse answers `SELECT 1` within the
 * timeout. The pool connects lazily, so this is also the first place a bad
 * WAREHOUSE_DATABASE_URL shows up.
 */

import { sql, type Kysely } from 'kysely';

import type { HealthChecker } from '../../core/ports.js';
import type { CheckOutcome } from '../../core/types.js';

const DEFAULT_TIMEOUT_MS = 3000;

export interface DbHealthCheckerOptions {
  name: string;
  timeoutMs?: number;
}

export const makeDbHealthChecker = <T>(
  db: Kysely<T>,
  options: DbHealthCheckerOptions
): HealthChecker => {
  const { name, timeoutMs = DEFAULT_TIMEOUT_MS } = options;

  return {
    name,
    critical: true,
    async check(): Promise<CheckOutcome> {
      const startTime = Date.now();
      let timer: NodeJS.Timeout | undefined;

      const timeout = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
          reject(new Error(`Database health check timed out after ${String(timeoutMs)}ms`));
        }, timeoutMs);
      });

      try {
        await Promise.race([sql`SELECT 1`.execute(db), timeout]);
        return { healthy: true, latencyMs: Date.now() - startTime };
      } catch (error) {
        return {
          healthy: false,
          message: error instanceof Error ? error.message : 'Warehouse query failed',
          latencyMs: Date.now() - startTime,
        };
      } finally {
        clearTimeout(timer);
      }
    },
  };
};
