/**
 * Amount helpers - plain numbers normalised to a fixed number of decimals
 * so that accumulated refunds compare cleanly against the captured amount
 */
export const AMOUNT_DECIMALS = 8;

/**
 * Round a value to AMOUNT_DECIMALS places
 */
export function normalizeAmount(value: number): number {
  return Number(value.toFixed(AMOUNT_DECIMALS));
}

/**
 * Check that a value can be charged or refunded
 */
export function isPositiveAmount(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Add two amounts
 */
export function addAmounts(a: number, b: number): number {
  return normalizeAmount(a + b);
}

/**
 * Subtract `b` from `a`, never going below zero
 */
export function subtractAmounts(a: number, b: number): number {
  return Math.max(0, normalizeAmount(a - b));
}
