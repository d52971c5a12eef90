/**
 * Use case: Revenue statement of one entity, by category and fund.
 */

import { loadFundStatement } from './load-fund-statement.js';

import type { QueryError } from '../../../../common/types/errors.js';
import type { FiscalDataRepository } from '../../../fiscal-data/core/ports.js';
import type { ReferenceCodes } from '../../../fiscal-data/core/types.js';
import type { FundStatement } from '../types.js';
import type { Result } from 'neverthrow';

export interface GetRevenuesDeps {
  fiscalDataRepo: FiscalDataRepository;
  referenceCodes: ReferenceCodes;
}

export const getRevenues = async (
  deps: GetRevenuesDeps,
  code: string
): Promise<Result<FundStatement, QueryError>> => {
  const repo = deps.fiscalDataRepo;
  return loadFundStatement(
    repo,
    code,
    (entityCode) => repo.listRevenueLines(entityCode),
    deps.referenceCodes.revenueCategories
  );
};
