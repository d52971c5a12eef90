import type { Decimal } from 'decimal.js';

/**
 * Decimal → JSON number for API responses. Null stays null.
 */
export const toAmount = (value: Decimal | null): number | null =>
  value === null ? null : value.toNumber();
