/**
 * Use case: Rank entities by population, assessed value or head count.
 */

import {
  DEFAULT_RANK_LIMIT,
  MAX_RANK_LIMIT,
  type RankEntitiesInput,
} from '../types.js';

import type { QueryError } from '../../../../common/types/errors.js';
import type { FiscalDataRepository } from '../../../fiscal-data/core/ports.js';
import type { RankedEntity } from '../../../fiscal-data/core/types.js';
import type { Result } from 'neverthrow';

export interface RankEntitiesDeps {
  fiscalDataRepo: FiscalDataRepository;
}

const optionalFilter = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed === undefined || trimmed === '' ? undefined : trimmed;
};

/**
 * Defaults: order 'top' (largest first), limit DEFAULT_RANK_LIMIT clamped to
 * [1, MAX_RANK_LIMIT]. Blank filters are ignored.
 */
export const rankEntities = async (
  deps: RankEntitiesDeps,
  input: RankEntitiesInput
): Promise<Result<RankedEntity[], QueryError>> => {
  const limit = Math.min(Math.max(1, input.limit ?? DEFAULT_RANK_LIMIT), MAX_RANK_LIMIT);

  return deps.fiscalDataRepo.rankEntities({
    metric: input.metric,
    order: input.order ?? 'top',
    entityType: optionalFilter(input.entityType),
    county: optionalFilter(input.county),
    limit,
  });
};
