/**
 * Rating scales for fiscal health indicators.
 *
 * Bands are checked top-down and the first match wins. Bounds are decimal
 * strings so boundary values compare exactly.
 */

import type { DebtRating, PensionRating, PerformanceRating } from './types.js';
import type { Decimal } from 'decimal.js';

export interface RatingScale<R extends string> {
  /** atLeast: higher is better (value ≥ bound); atMost: lower is better (value ≤ bound) */
  comparison: 'atLeast' | 'atMost';
  bands: readonly { readonly bound: string; readonly rating: R }[];
  otherwise: R;
}

export const OPERATING_MARGIN_SCALE: RatingScale<PerformanceRating> = {
  comparison: 'atLeast',
  bands: [
    { bound: '0.05', rating: 'Excellent' },
    { bound: '0', rating: 'Good' },
    { bound: '-0.05', rating: 'Fair' },
  ],
  otherwise: 'Poor',
};

export const FUND_BALANCE_SCALE: RatingScale<PerformanceRating> = {
  comparison: 'atLeast',
  bands: [
    { bound: '0.25', rating: 'Excellent' },
    { bound: '0.15', rating: 'Good' },
    { bound: '0.08', rating: 'Fair' },
  ],
  otherwise: 'Poor',
};

// Funded ratios are reported in percent
export const PENSION_FUNDED_SCALE: RatingScale<PensionRating> = {
  comparison: 'atLeast',
  bands: [
    { bound: '80', rating: 'Excellent' },
    { bound: '60', rating: 'Good' },
    { bound: '40', rating: 'Fair' },
  ],
  otherwise: 'Critical',
};

// Upper bounds are inclusive: exactly $1,000 per resident is still Low
export const DEBT_PER_CAPITA_SCALE: RatingScale<DebtRating> = {
  comparison: 'atMost',
  bands: [
    { bound: '1000', rating: 'Low' },
    { bound: '2500', rating: 'Moderate' },
    { bound: '5000', rating: 'High' },
  ],
  otherwise: 'Very High',
};

export const rate = <R extends string>(value: Decimal, scale: RatingScale<R>): R => {
  const band = scale.bands.find((b) =>
    scale.comparison === 'atLeast' ? value.gte(b.bound) : value.lte(b.bound)
  );
  return band?.rating ?? scale.otherwise;
};
