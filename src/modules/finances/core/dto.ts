/**
 * JSON views of statements, shared by the REST routes and the MCP tools
 */

import { toAmount } from '../../../common/utils/amounts.js';
import { FUND_KEYS } from '../../fiscal-data/core/types.js';

import type {
  DebtStatement,
  FundBalanceStatement,
  FundStatement,
  FundTotals,
  PensionStatement,
  StatementLine,
} from './types.js';

export type FundTotalsDto = Record<keyof FundTotals, number>;

const toFundTotalsDto = (totals: FundTotals): FundTotalsDto => {
  const dto: FundTotalsDto = {
    general: 0,
    specialRevenue: 0,
    capitalProjects: 0,
    debtService: 0,
    enterprise: 0,
    trust: 0,
    fiduciary: 0,
  };
  for (const key of FUND_KEYS) {
    dto[key] = totals[key].toNumber();
  }
  return dto;
};

const toLineDto = (line: StatementLine) => ({
  category: line.category,
  label: line.label,
  amounts: toFundTotalsDto(line.amounts),
  total: line.total.toNumber(),
});

export const toFundStatementDto = (statement: FundStatement) => ({
  entity: statement.entity,
  lines: statement.lines.map(toLineDto),
  fundTotals: toFundTotalsDto(statement.fundTotals),
  total: statement.total.toNumber(),
});

export const toFundBalanceStatementDto = (statement: FundBalanceStatement) => ({
  entity: statement.entity,
  lines: statement.lines.map((line) => ({
    ...toLineDto(line),
    debtPrincipal: line.debtPrincipal.toNumber(),
  })),
  unassigned: statement.unassigned.toNumber(),
});

export const toDebtStatementDto = (statement: DebtStatement) => ({
  entity: statement.entity,
  reported: statement.reported,
  longTerm: statement.longTerm.toNumber(),
  shortTerm: statement.shortTerm.toNumber(),
  total: statement.total.toNumber(),
  perCapita: toAmount(statement.perCapita),
  instruments: statement.instruments.map((instrument) => ({
    instrument: instrument.instrument,
    label: instrument.label,
    beginningBalance: instrument.beginningBalance.toNumber(),
  })),
});

export const toPensionStatementDto = (statement: PensionStatement) => ({
  entity: statement.entity,
  systems: statement.systems.map((system) => ({
    system: system.system,
    label: system.label,
    totalLiability: system.totalLiability.toNumber(),
    planAssets: toAmount(system.planAssets),
    netLiability: toAmount(system.netLiability),
    fundedRatio: toAmount(system.fundedRatio),
  })),
  totalLiability: statement.totalLiability.toNumber(),
});
