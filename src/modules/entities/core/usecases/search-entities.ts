/**
 * Use case: Search entities by name or county.
 */

import { err, type Result } from 'neverthrow';

import { createValidationError, type QueryError } from '../../../../common/types/errors.js';
import {
  DEFAULT_SEARCH_LIMIT,
  MAX_SEARCH_LIMIT,
  SEARCH_MIN_LENGTH,
  type SearchEntitiesInput,
} from '../types.js';

import type { FiscalDataRepository } from '../../../fiscal-data/core/ports.js';
import type { EntitySummary } from '../../../fiscal-data/core/types.js';

export interface SearchEntitiesDeps {
  fiscalDataRepo: FiscalDataRepository;
}

/**
 * Validation:
 * - query is trimmed and must have at least SEARCH_MIN_LENGTH characters
 * - limit defaults to DEFAULT_SEARCH_LIMIT and is clamped to [1, MAX_SEARCH_LIMIT]
 */
export const searchEntities = async (
  deps: SearchEntitiesDeps,
  input: SearchEntitiesInput
): Promise<Result<EntitySummary[], QueryError>> => {
  const query = input.query.trim();
  if (query.length < SEARCH_MIN_LENGTH) {
    return err(
      createValidationError(
        `Search query must be at least ${String(SEARCH_MIN_LENGTH)} characters`,
        'query',
        input.query
      )
    );
  }

  const limit = Math.min(Math.max(1, input.limit ?? DEFAULT_SEARCH_LIMIT), MAX_SEARCH_LIMIT);

  return deps.fiscalDataRepo.searchEntities(query, limit);
};
