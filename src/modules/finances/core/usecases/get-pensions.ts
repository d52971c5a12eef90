/**
 * Use case: Pension systems of one entity.
 */

import { Decimal } from 'decimal.js';
import { ok, err, type Result } from 'neverthrow';

import { toEntitySummary } from './load-fund-statement.js';
import { requireEntity } from '../../../fiscal-data/core/require-entity.js';

import type { QueryError } from '../../../../common/types/errors.js';
import type { FiscalDataRepository } from '../../../fiscal-data/core/ports.js';
import type { ReferenceCodes } from '../../../fiscal-data/core/types.js';
import type { PensionStatement, PensionSystemSummary } from '../types.js';

export interface GetPensionsDeps {
  fiscalDataRepo: FiscalDataRepository;
  referenceCodes: ReferenceCodes;
}

/**
 * Only systems with a positive total liability are listed; the others are
 * systems the entity does not participate in.
 */
export const getPensions = async (
  deps: GetPensionsDeps,
  code: string
): Promise<Result<PensionStatement, QueryError>> => {
  const repo = deps.fiscalDataRepo;

  const entityResult = await requireEntity(repo, code.trim());
  if (entityResult.isErr()) {
    return err(entityResult.error);
  }
  const entity = entityResult.value;

  const pensionsResult = await repo.listPensions(entity.code);
  if (pensionsResult.isErr()) {
    return err(pensionsResult.error);
  }

  const systems: PensionSystemSummary[] = [];
  for (const record of pensionsResult.value) {
    const liability = record.totalLiability;
    if (liability === null || liability.lte(0)) {
      continue;
    }
    systems.push({
      system: record.system,
      label: deps.referenceCodes.pensionSystems[record.system],
      totalLiability: liability,
      planAssets: record.planAssets,
      netLiability: record.planAssets === null ? null : liability.minus(record.planAssets),
      fundedRatio: record.fundedRatio,
    });
  }

  const totalLiability = systems.reduce(
    (total, system) => total.plus(system.totalLiability),
    new Decimal(0)
  );

  return ok({ entity: toEntitySummary(entity), systems, totalLiability });
};
