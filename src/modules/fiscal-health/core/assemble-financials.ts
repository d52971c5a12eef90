/**
 * Builds engine input from the statements stored for an entity.
 */

import {
  FUND_KEYS,
  type EntityDetails,
  type FundBalanceLine,
  type FundLine,
  type IndebtednessRecord,
  type PensionRecord,
  type PensionSystem,
} from '../../fiscal-data/core/types.js';

import type { EntityFinancials, FundBreakdown, PensionRatioKey } from './types.js';
import type { Decimal } from 'decimal.js';

/** GASB 54 "Unassigned" fund-balance classification */
export const UNASSIGNED_FUND_BALANCE_CATEGORY = '307t';

const PENSION_KEY_BY_SYSTEM: Record<PensionSystem, PensionRatioKey> = {
  imrf: 'general',
  police: 'police',
  fire: 'fire',
};

export interface EntityStatements {
  entity: EntityDetails;
  revenueLines: FundLine[];
  expenditureLines: FundLine[];
  fundBalanceLines: FundBalanceLine[];
  indebtedness: IndebtednessRecord | null;
  pensions: PensionRecord[];
}

/**
 * Per fund, sums the non-null amounts across category lines. A fund with
 * no reported amount stays null; the engine coalesces it.
 */
export const sumFundLines = (lines: readonly FundLine[]): FundBreakdown => {
  const breakdown: FundBreakdown = {};
  for (const key of FUND_KEYS) {
    let total: Decimal | null = null;
    for (const line of lines) {
      const amount = line.amounts[key];
      if (amount !== null) {
        total = total === null ? amount : total.plus(amount);
      }
    }
    breakdown[key] = total;
  }
  return breakdown;
};

export const assembleFinancials = (statements: EntityStatements): EntityFinancials => {
  const { entity, indebtedness } = statements;

  const unassignedLine = statements.fundBalanceLines.find(
    (line) => line.category === UNASSIGNED_FUND_BALANCE_CATEGORY
  );

  const pensionFundedRatios: EntityFinancials['pensionFundedRatios'] = {};
  for (const pension of statements.pensions) {
    pensionFundedRatios[PENSION_KEY_BY_SYSTEM[pension.system]] = pension.fundedRatio;
  }

  return {
    entityId: entity.code,
    population: entity.population,
    assessedValue: entity.assessedValue,
    revenue: sumFundLines(statements.revenueLines),
    expenditure: sumFundLines(statements.expenditureLines),
    unassignedFundBalance: unassignedLine?.amounts.general ?? null,
    debt: {
      longTerm: indebtedness?.longTerm ?? null,
      shortTerm: indebtedness?.shortTerm ?? null,
    },
    pensionFundedRatios,
  };
};
