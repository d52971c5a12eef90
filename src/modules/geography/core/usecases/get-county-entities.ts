/**
 * Use case: List the reporting units of a county.
 */

import { err, type Result } from 'neverthrow';

import { createValidationError, type QueryError } from '../../../../common/types/errors.js';

import type { FiscalDataRepository } from '../../../fiscal-data/core/ports.js';
import type { CountyEntity } from '../../../fiscal-data/core/types.js';

export interface GetCountyEntitiesDeps {
  fiscalDataRepo: FiscalDataRepository;
}

export interface GetCountyEntitiesInput {
  county: string;
  entityType?: string | undefined;
}

/**
 * County and entity type match case-insensitively. Largest population first.
 * An unknown county yields an empty list.
 */
export const getCountyEntities = async (
  deps: GetCountyEntitiesDeps,
  input: GetCountyEntitiesInput
): Promise<Result<CountyEntity[], QueryError>> => {
  const county = input.county.trim();
  if (county === '') {
    return err(createValidationError('County name is required', 'county', input.county));
  }

  const entityType = input.entityType?.trim();
  return deps.fiscalDataRepo.listEntitiesByCounty(
    county,
    entityType === undefined || entityType === '' ? undefined : entityType
  );
};
