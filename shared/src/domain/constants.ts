/**
 * Domain Constants
 *
 * Defaults shared by the cost model, lot store and engine configuration.
 */

// ============================================
// TAX
// ============================================

/** Default sales tax applied to base price: 8.6% */
export const DEFAULT_TAX_RATE = 0.086;

/** Convert a percentage (8.6) to the fraction used by the cost model (0.086) */
export function percentToRate(percent: number): number {
  return percent / 100;
}

/** Convert a cost-model fraction (0.086) to a percentage (8.6) */
export function rateToPercent(rate: number): number {
  return Math.round(rate * 100 * 1e6) / 1e6;
}

// ============================================
// RATINGS
// ============================================

export const RATING_MIN = 1;
export const RATING_MAX = 10;

// ============================================
// PACK SIZES (shipping calculator)
// ============================================

export const FIVE_PACK = 5;
export const TEN_PACK = 10;
