/**
 * Use case: Compare size and spending of several entities side by side.
 */

import { ok, err, type Result } from 'neverthrow';

import { createValidationError, type QueryError } from '../../../../common/types/errors.js';
import { sumFundLines } from '../../../fiscal-health/core/assemble-financials.js';
import { safeDivide, totalOfFunds } from '../../../fiscal-health/core/compute-health.js';
import {
  MAX_COMPARE_CODES,
  MIN_COMPARE_CODES,
  type EntityComparison,
  type EntityComparisonRow,
} from '../types.js';

import type { FiscalDataRepository } from '../../../fiscal-data/core/ports.js';

export interface CompareEntitiesDeps {
  fiscalDataRepo: FiscalDataRepository;
}

const loadComparisonRow = async (
  repo: FiscalDataRepository,
  code: string
): Promise<Result<EntityComparisonRow | null, QueryError>> => {
  const entityResult = await repo.findEntityByCode(code);
  if (entityResult.isErr()) {
    return err(entityResult.error);
  }
  const entity = entityResult.value;
  if (entity === null) {
    return ok(null);
  }

  const [revenues, expenditures] = await Promise.all([
    repo.listRevenueLines(code),
    repo.listExpenditureLines(code),
  ]);
  if (revenues.isErr()) return err(revenues.error);
  if (expenditures.isErr()) return err(expenditures.error);

  const totalRevenue = totalOfFunds(sumFundLines(revenues.value));
  const totalExpenditure = totalOfFunds(sumFundLines(expenditures.value));

  return ok({
    code: entity.code,
    name: entity.name,
    entityType: entity.entityType,
    county: entity.county,
    population: entity.population,
    assessedValue: entity.assessedValue,
    totalRevenue,
    totalExpenditure,
    revenuePerCapita: safeDivide(totalRevenue, entity.population),
    expenditurePerCapita: safeDivide(totalExpenditure, entity.population),
  });
};

/**
 * Validation:
 * - codes are trimmed and de-duplicated, keeping the first occurrence
 * - between MIN_COMPARE_CODES and MAX_COMPARE_CODES distinct codes
 *
 * Unknown codes do not fail the comparison; they are reported in `notFound`.
 */
export const compareEntities = async (
  deps: CompareEntitiesDeps,
  codes: readonly string[]
): Promise<Result<EntityComparison, QueryError>> => {
  const distinct = [...new Set(codes.map((code) => code.trim()).filter((code) => code !== ''))];

  if (distinct.length < MIN_COMPARE_CODES || distinct.length > MAX_COMPARE_CODES) {
    return err(
      createValidationError(
        `Provide between ${String(MIN_COMPARE_CODES)} and ${String(MAX_COMPARE_CODES)} distinct entity codes`,
        'codes',
        codes
      )
    );
  }

  const rows = await Promise.all(
    distinct.map((code) => loadComparisonRow(deps.fiscalDataRepo, code))
  );

  const comparison: EntityComparison = { entities: [], notFound: [] };
  for (const [position, row] of rows.entries()) {
    if (row.isErr()) {
      return err(row.error);
    }
    if (row.value === null) {
      comparison.notFound.push(distinct[position] ?? '');
    } else {
      comparison.entities.push(row.value);
    }
  }

  return ok(comparison);
};
