/**
 * Shared flow of the revenue and expenditure statements.
 */

import { ok, err, type Result } from 'neverthrow';

import { requireEntity } from '../../../fiscal-data/core/require-entity.js';
import { sumStatementLines, toStatementLine } from '../statement-lines.js';

import type { QueryError } from '../../../../common/types/errors.js';
import type { FiscalDataRepository } from '../../../fiscal-data/core/ports.js';
import type { EntityDetails, EntitySummary, FundLine } from '../../../fiscal-data/core/types.js';
import type { FiscalDataError } from '../../../fiscal-data/core/errors.js';
import type { FundStatement } from '../types.js';

export const toEntitySummary = (entity: EntityDetails): EntitySummary => ({
  code: entity.code,
  name: entity.name,
  entityType: entity.entityType,
  county: entity.county,
});

export const loadFundStatement = async (
  repo: FiscalDataRepository,
  code: string,
  listLines: (code: string) => Promise<Result<FundLine[], FiscalDataError>>,
  labels: Record<string, string>
): Promise<Result<FundStatement, QueryError>> => {
  const entityResult = await requireEntity(repo, code.trim());
  if (entityResult.isErr()) {
    return err(entityResult.error);
  }
  const entity = entityResult.value;

  const linesResult = await listLines(entity.code);
  if (linesResult.isErr()) {
    return err(linesResult.error);
  }

  const lines = linesResult.value.map((line) => toStatementLine(line, labels));
  const { fundTotals, total } = sumStatementLines(lines);

  return ok({ entity: toEntitySummary(entity), lines, fundTotals, total });
};
