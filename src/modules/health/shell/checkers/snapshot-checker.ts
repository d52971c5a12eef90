/**
 * Snapshot checker: the YAML snapshot has been read and validated. The
 * repository retries a failed load on the next call, so a fixed file turns
 * the check healthy without a restart.
 */

import type { HealthChecker } from '../../core/ports.js';
import type { CheckOutcome } from '../../core/types.js';
import type { Result } from 'neverthrow';

export interface SnapshotLoader {
  ensureLoaded(): Promise<Result<unknown, { message: string }>>;
}

export interface SnapshotHealthCheckerOptions {
  name: string;
}

export const makeSnapshotHealthChecker = (
  loader: SnapshotLoader,
  options: SnapshotHealthCheckerOptions
): HealthChecker => ({
  name: options.name,
  critical: true,
  async check(): Promise<CheckOutcome> {
    const startTime = Date.now();
    const loaded = await loader.ensureLoaded();
    const latencyMs = Date.now() - startTime;

    return loaded.isErr()
      ? { healthy: false, message: loaded.error.message, latencyMs }
      : { healthy: true, latencyMs };
  },
});
