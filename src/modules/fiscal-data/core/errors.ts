/**
 * Domain error types for the Fiscal Data module.
 */

import type { InfraError } from '../../../common/types/errors.js';

/**
 * Repositories only fail for infrastructure reasons (query or snapshot file).
 */
export type FiscalDataError = InfraError;

export {
  createDatabaseError,
  createSnapshotError,
} from '../../../common/types/errors.js';
