/**
 * Use case: Compute the fiscal health report of one entity.
 */

import { ok, err, type Result } from 'neverthrow';

import { requireEntity } from '../../../fiscal-data/core/require-entity.js';
import { assembleFinancials } from '../assemble-financials.js';
import { computeHealth } from '../compute-health.js';

import type { InfraError, NotFoundError } from '../../../../common/types/errors.js';
import type { FiscalDataRepository } from '../../../fiscal-data/core/ports.js';
import type { EntityDetails } from '../../../fiscal-data/core/types.js';
import type { EntityFinancials, FiscalHealthReport } from '../types.js';

export interface GetFiscalHealthDeps {
  fiscalDataRepo: FiscalDataRepository;
}

export interface FiscalHealthResult {
  entity: EntityDetails;
  financials: EntityFinancials;
  report: FiscalHealthReport;
}

/**
 * Loads the entity's statements, assembles the engine input and computes
 * the report. Nothing is cached; every call recomputes.
 */
export async function getFiscalHealth(
  deps: GetFiscalHealthDeps,
  rawCode: string
): Promise<Result<FiscalHealthResult, InfraError | NotFoundError>> {
  const repo = deps.fiscalDataRepo;

  // 1. Resolve entity
  const entityResult = await requireEntity(repo, rawCode.trim());
  if (entityResult.isErr()) {
    return err(entityResult.error);
  }
  const entity = entityResult.value;
  const { code } = entity;

  // 2. Load statements
  const [revenues, expenditures, fundBalances, indebtedness, pensions] = await Promise.all([
    repo.listRevenueLines(code),
    repo.listExpenditureLines(code),
    repo.listFundBalanceLines(code),
    repo.findIndebtedness(code),
    repo.listPensions(code),
  ]);

  if (revenues.isErr()) return err(revenues.error);
  if (expenditures.isErr()) return err(expenditures.error);
  if (fundBalances.isErr()) return err(fundBalances.error);
  if (indebtedness.isErr()) return err(indebtedness.error);
  if (pensions.isErr()) return err(pensions.error);

  // 3. Compute
  const financials = assembleFinancials({
    entity,
    revenueLines: revenues.value,
    expenditureLines: expenditures.value,
    fundBalanceLines: fundBalances.value,
    indebtedness: indebtedness.value,
    pensions: pensions.value,
  });

  return ok({ entity, financials, report: computeHealth(financials) });
}
