import type { CheckOutcome } from './types.js';

/**
 * A dependency the service needs before it can answer queries: the warehouse
 * connection or the snapshot file.
 */
export interface HealthChecker {
  readonly name: string;
  /** Defaults to true; a failed non-critical check only degrades readiness */
  readonly critical?: boolean;
  check(): Promise<CheckOutcome>;
}
