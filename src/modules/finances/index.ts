/**
 * Finances Module - Public API
 *
 * Revenue, expenditure, fund balance, debt and pension statements of one
 * entity.
 */

export type {
  FundTotals,
  StatementLine,
  FundStatement,
  FundBalanceStatement,
  FundBalanceStatementLine,
  DebtStatement,
  DebtInstrumentBalance,
  PensionStatement,
  PensionSystemSummary,
} from './core/types.js';

export { categoryLabel, toStatementLine, sumStatementLines } from './core/statement-lines.js';

export {
  toFundStatementDto,
  toFundBalanceStatementDto,
  toDebtStatementDto,
  toPensionStatementDto,
} from './core/dto.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export { getRevenues, type GetRevenuesDeps } from './core/usecases/get-revenues.js';
export { getExpenditures, type GetExpendituresDeps } from './core/usecases/get-expenditures.js';
export { getFundBalances, type GetFundBalancesDeps } from './core/usecases/get-fund-balances.js';
export { getDebt, type GetDebtDeps } from './core/usecases/get-debt.js';
export { getPensions, type GetPensionsDeps } from './core/usecases/get-pensions.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - REST Routes
// ─────────────────────────────────────────────────────────────────────────────

export { makeFinanceRoutes, type MakeFinanceRoutesDeps } from './shell/rest/routes.js';
