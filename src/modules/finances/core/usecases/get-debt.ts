/**
 * Use case: Outstanding debt of one entity.
 */

import { Decimal } from 'decimal.js';
import { ok, err, type Result } from 'neverthrow';

import { toEntitySummary } from './load-fund-statement.js';
import { requireEntity } from '../../../fiscal-data/core/require-entity.js';
import { DEBT_INSTRUMENTS } from '../../../fiscal-data/core/types.js';
import { safeDivide } from '../../../fiscal-health/core/compute-health.js';

import type { QueryError } from '../../../../common/types/errors.js';
import type { FiscalDataRepository } from '../../../fiscal-data/core/ports.js';
import type { ReferenceCodes } from '../../../fiscal-data/core/types.js';
import type { DebtStatement } from '../types.js';

export interface GetDebtDeps {
  fiscalDataRepo: FiscalDataRepository;
  referenceCodes: ReferenceCodes;
}

const ZERO = new Decimal(0);

/**
 * Total debt is long-term (t404) plus short-term (t410), each missing part
 * counted as zero. An entity without an indebtedness schedule reports zero.
 */
export const getDebt = async (
  deps: GetDebtDeps,
  code: string
): Promise<Result<DebtStatement, QueryError>> => {
  const repo = deps.fiscalDataRepo;

  const entityResult = await requireEntity(repo, code.trim());
  if (entityResult.isErr()) {
    return err(entityResult.error);
  }
  const entity = entityResult.value;

  const recordResult = await repo.findIndebtedness(entity.code);
  if (recordResult.isErr()) {
    return err(recordResult.error);
  }
  const record = recordResult.value;

  const longTerm = record?.longTerm ?? ZERO;
  const shortTerm = record?.shortTerm ?? ZERO;
  const total = longTerm.plus(shortTerm);

  return ok({
    entity: toEntitySummary(entity),
    reported: record !== null,
    longTerm,
    shortTerm,
    total,
    perCapita: safeDivide(total, entity.population),
    instruments: DEBT_INSTRUMENTS.map((instrument) => ({
      instrument,
      label: deps.referenceCodes.debtInstruments[instrument],
      beginningBalance: record?.beginningBalances[instrument] ?? ZERO,
    })),
  });
};
