/**
 * Use case: Aggregate statistics of a county's reporting units.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createNotFoundError,
  createValidationError,
  type QueryError,
} from '../../../../common/types/errors.js';

import type { FiscalDataRepository } from '../../../fiscal-data/core/ports.js';
import type { CountySummary } from '../../../fiscal-data/core/types.js';

export interface GetCountySummaryDeps {
  fiscalDataRepo: FiscalDataRepository;
}

export const getCountySummary = async (
  deps: GetCountySummaryDeps,
  rawCounty: string
): Promise<Result<CountySummary, QueryError>> => {
  const county = rawCounty.trim();
  if (county === '') {
    return err(createValidationError('County name is required', 'county', rawCounty));
  }

  const result = await deps.fiscalDataRepo.getCountySummary(county);
  if (result.isErr()) {
    return err(result.error);
  }
  if (result.value === null) {
    return err(createNotFoundError('County', county));
  }
  return ok(result.value);
};
