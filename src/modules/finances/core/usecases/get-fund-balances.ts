/**
 * Use case: Fund balances of one entity by GASB 54 classification.
 */

import { Decimal } from 'decimal.js';
import { ok, err, type Result } from 'neverthrow';

import { toEntitySummary } from './load-fund-statement.js';
import { requireEntity } from '../../../fiscal-data/core/require-entity.js';
import { UNASSIGNED_FUND_BALANCE_CATEGORY } from '../../../fiscal-health/core/assemble-financials.js';
import { toStatementLine } from '../statement-lines.js';

import type { QueryError } from '../../../../common/types/errors.js';
import type { FiscalDataRepository } from '../../../fiscal-data/core/ports.js';
import type { ReferenceCodes } from '../../../fiscal-data/core/types.js';
import type { FundBalanceStatement } from '../types.js';

export interface GetFundBalancesDeps {
  fiscalDataRepo: FiscalDataRepository;
  referenceCodes: ReferenceCodes;
}

export const getFundBalances = async (
  deps: GetFundBalancesDeps,
  code: string
): Promise<Result<FundBalanceStatement, QueryError>> => {
  const repo = deps.fiscalDataRepo;

  const entityResult = await requireEntity(repo, code.trim());
  if (entityResult.isErr()) {
    return err(entityResult.error);
  }
  const entity = entityResult.value;

  const linesResult = await repo.listFundBalanceLines(entity.code);
  if (linesResult.isErr()) {
    return err(linesResult.error);
  }

  const labels = deps.referenceCodes.fundBalanceCategories;
  const lines = linesResult.value.map((line) => ({
    ...toStatementLine(line, labels),
    debtPrincipal: line.debtPrincipal ?? new Decimal(0),
  }));

  // Same figure the fiscal health engine uses
  const unassigned =
    linesResult.value.find((line) => line.category === UNASSIGNED_FUND_BALANCE_CATEGORY)?.amounts
      .general ?? new Decimal(0);

  return ok({ entity: toEntitySummary(entity), lines, unassigned });
};
