/**
 * Cost Model — Pure Functions
 *
 * Amortized per-unit cost of a lot. No state, no I/O.
 *
 * Rules:
 * - Base price and tax are spread over the units still on hand (`count`)
 * - Shipping is spread over the quantity originally bought (`originalQuantity`),
 *   so the per-unit shipping of remaining stock does not grow as it sells
 * - Lots without an original quantity (legacy records) fall back to `count`
 * - count <= 0 → 0, never a division by zero
 */

import {
  INVENTORY_ERROR_CODES,
  getInventoryErrorMessage,
  type InventoryErrorCode,
} from '../../errors/index.js';

// ============================================
// TYPES
// ============================================

/** Raw value from a form field or an imported record */
export type NumericInput = number | string | null | undefined;

export interface UnitCostInput {
  /** Total price paid for the lot */
  price: NumericInput;
  /** Total shipping (and collapsed tax) charged to the lot */
  shipping: NumericInput;
  /** Units remaining */
  count: NumericInput;
  /** Amortization base for shipping; omitted for legacy lots */
  originalQuantity?: NumericInput;
}

/**
 * Fail-soft numeric result. An invalid input still carries `value: 0`
 * so the caller can render it, but `ok` tells it apart from a computed zero.
 */
export type CostResult =
  | { ok: true; value: number }
  | { ok: false; value: 0; error: { code: InventoryErrorCode; message: string; field: string } };

// ============================================
// PARSERS
// ============================================

const CURRENCY_NOISE = /[$,\s]/g;

function toNumber(input: NumericInput): number | null {
  if (typeof input === 'number') {
    return Number.isFinite(input) ? input : null;
  }
  if (typeof input !== 'string') return null;
  const cleaned = input.replace(CURRENCY_NOISE, '');
  if (cleaned === '') return null;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

/** Non-negative decimal amount (price, shipping, tax). Accepts "$1,250.00". */
export function parseAmount(input: NumericInput): number | null {
  const n = toNumber(input);
  return n !== null && n >= 0 ? n : null;
}

/** Non-negative whole unit count */
export function parseQuantity(input: NumericInput): number | null {
  const n = toNumber(input);
  return n !== null && n >= 0 && Number.isInteger(n) ? n : null;
}

/** Positive whole quantity for a sale, resupply line, or reversal */
export function parsePositiveQuantity(input: NumericInput): number | null {
  const n = parseQuantity(input);
  return n !== null && n > 0 ? n : null;
}

// ============================================
// CORE FUNCTIONS
// ============================================

/**
 * Per-unit cost including tax on the base price and amortized shipping.
 *
 *   perUnitBase     = price / count
 *   withTax         = perUnitBase * (1 + taxRate)
 *   perUnitShipping = shipping / (originalQuantity || count)
 *   unitCost        = withTax + perUnitShipping
 */
export function unitCost(
  price: number,
  shipping: number,
  count: number,
  originalQuantity: number | null | undefined,
  taxRate: number,
): number {
  if (count <= 0) return 0;

  const perUnitBase = price / count;
  const withTax = perUnitBase * (1 + taxRate);
  const shippingBase = originalQuantity && originalQuantity > 0 ? originalQuantity : count;
  const perUnitShipping = shipping / shippingBase;

  return withTax + perUnitShipping;
}

/**
 * Unit cost from raw input. Malformed fields yield `{ ok: false, value: 0 }`
 * naming the first offending field.
 */
export function computeUnitCost(input: UnitCostInput, taxRate: number): CostResult {
  const price = parseAmount(input.price);
  if (price === null) return invalid('price');

  const shipping = parseAmount(input.shipping);
  if (shipping === null) return invalid('shipping');

  const count = parseQuantity(input.count);
  if (count === null) return invalid('count');

  let originalQuantity: number | null = null;
  if (input.originalQuantity !== undefined && input.originalQuantity !== null) {
    originalQuantity = parseQuantity(input.originalQuantity);
    if (originalQuantity === null) return invalid('originalQuantity');
  }

  return { ok: true, value: unitCost(price, shipping, count, originalQuantity, taxRate) };
}

/**
 * Unit cost of one purchase line considered on its own
 * (what the incoming units cost before being folded into a lot).
 */
export function purchaseUnitCost(
  count: number,
  price: number,
  shipping: number,
  tax: number,
  taxRate: number,
): number {
  return unitCost(price, shipping + tax, count, count, taxRate);
}

// ============================================
// HELPERS
// ============================================

function invalid(field: string): CostResult {
  return {
    ok: false,
    value: 0,
    error: {
      code: INVENTORY_ERROR_CODES.INVALID_NUMERIC_INPUT,
      message: getInventoryErrorMessage(INVENTORY_ERROR_CODES.INVALID_NUMERIC_INPUT),
      field,
    },
  };
}
