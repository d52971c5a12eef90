/**
 * Fiscal Health Module - Public API
 *
 * Ratio engine over one entity's annual financials, plus the use case and
 * route that feed it from the fiscal data repository.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  FundBreakdown,
  DebtBreakdown,
  PensionRatioKey,
  PensionFundedRatios,
  EntityFinancials,
  PerformanceRating,
  PensionRating,
  DebtRating,
  RatedMetric,
  FiscalHealthTotals,
  FiscalHealthReport,
} from './core/types.js';

export { PENSION_RATIO_KEYS } from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Engine
// ─────────────────────────────────────────────────────────────────────────────

export {
  OPERATING_MARGIN_SCALE,
  FUND_BALANCE_SCALE,
  PENSION_FUNDED_SCALE,
  DEBT_PER_CAPITA_SCALE,
  rate,
  type RatingScale,
} from './core/thresholds.js';

export {
  computeHealth,
  safeDivide,
  sumCoalesced,
  totalOfFunds,
  lowestPensionRatio,
} from './core/compute-health.js';

export {
  assembleFinancials,
  sumFundLines,
  UNASSIGNED_FUND_BALANCE_CATEGORY,
  type EntityStatements,
} from './core/assemble-financials.js';

export { toFiscalHealthDto, type FiscalHealthDto } from './core/dto.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  getFiscalHealth,
  type GetFiscalHealthDeps,
  type FiscalHealthResult,
} from './core/usecases/get-fiscal-health.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - REST Routes
// ─────────────────────────────────────────────────────────────────────────────

export { makeFiscalHealthRoutes, type MakeFiscalHealthRoutesDeps } from './shell/rest/routes.js';
