/**
 * Finances - Domain Types
 *
 * Statement views of one entity: reported cells are coalesced to zero so
 * every line and fund carries a total.
 */

import type {
  DebtInstrument,
  EntitySummary,
  FundKey,
  PensionSystem,
} from '../../fiscal-data/core/types.js';
import type { Decimal } from 'decimal.js';

export type FundTotals = Record<FundKey, Decimal>;

export interface StatementLine {
  /** Category code, e.g. "201t" */
  category: string;
  /** Category name; the code itself when the code is not in the vocabulary */
  label: string;
  amounts: FundTotals;
  total: Decimal;
}

export interface FundStatement {
  entity: EntitySummary;
  lines: StatementLine[];
  fundTotals: FundTotals;
  total: Decimal;
}

export interface FundBalanceStatementLine extends StatementLine {
  debtPrincipal: Decimal;
}

export interface FundBalanceStatement {
  entity: EntitySummary;
  lines: FundBalanceStatementLine[];
  /** General-fund amount of the Unassigned (307t) classification */
  unassigned: Decimal;
}

export interface DebtInstrumentBalance {
  instrument: DebtInstrument;
  label: string;
  beginningBalance: Decimal;
}

export interface DebtStatement {
  entity: EntitySummary;
  /** False when the entity filed no indebtedness schedule */
  reported: boolean;
  longTerm: Decimal;
  shortTerm: Decimal;
  total: Decimal;
  perCapita: Decimal | null;
  instruments: DebtInstrumentBalance[];
}

export interface PensionSystemSummary {
  system: PensionSystem;
  label: string;
  totalLiability: Decimal;
  planAssets: Decimal | null;
  /** Liability minus assets; positive means underfunded */
  netLiability: Decimal | null;
  fundedRatio: Decimal | null;
}

export interface PensionStatement {
  entity: EntitySummary;
  systems: PensionSystemSummary[];
  totalLiability: Decimal;
}
