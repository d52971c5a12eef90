/**
 * Use case: Get full details of one entity.
 */

import { requireEntity } from '../../../fiscal-data/core/require-entity.js';

import type { QueryError } from '../../../../common/types/errors.js';
import type { FiscalDataRepository } from '../../../fiscal-data/core/ports.js';
import type { EntityDetails } from '../../../fiscal-data/core/types.js';
import type { Result } from 'neverthrow';

export interface GetEntityDeps {
  fiscalDataRepo: FiscalDataRepository;
}

export const getEntity = async (
  deps: GetEntityDeps,
  code: string
): Promise<Result<EntityDetails, QueryError>> => {
  return requireEntity(deps.fiscalDataRepo, code.trim());
};
