/**
 * Shipping calculator and sale quotes — the numbers shown before an order
 * or sale is committed.
 */

import { FIVE_PACK, TEN_PACK } from '../constants.js';
import type { Lot } from '../lots/types.js';

export interface ShippingBreakdown {
  totalShipping: number;
  totalUnits: number;
  /** Shipping per unit over the whole order; the full amount when units <= 0 */
  perUnit: number;
  perUnitFivePack: number;
  perUnitTenPack: number;
}

export function shippingBreakdown(totalShipping: number, totalUnits: number): ShippingBreakdown {
  return {
    totalShipping,
    totalUnits,
    perUnit: totalUnits > 0 ? totalShipping / totalUnits : totalShipping,
    perUnitFivePack: totalShipping / FIVE_PACK,
    perUnitTenPack: totalShipping / TEN_PACK,
  };
}

/**
 * Proportional allocation of an order's shipping by unit count.
 * Returns one amount per input count, in order.
 */
export function allocateShippingByUnits(totalShipping: number, counts: readonly number[]): number[] {
  const units = counts.reduce((sum, c) => sum + c, 0);
  const perUnit = units > 0 ? totalShipping / units : 0;
  return counts.map((c) => perUnit * c);
}

export interface QuoteItem {
  lotId: string;
  quantity: number;
}

export interface QuoteLine {
  lotId: string;
  quantity: number;
  unitPrice: number;
  total: number;
}

export interface SaleQuote {
  lines: QuoteLine[];
  totalUnits: number;
  totalPrice: number;
}

/** Running total of a prospective sale at current unit costs; unknown lots are left out */
export function quoteSale(lots: readonly Lot[], items: readonly QuoteItem[]): SaleQuote {
  const lines: QuoteLine[] = [];
  for (const item of items) {
    const lot = lots.find((l) => l.id === item.lotId);
    if (!lot) continue;
    lines.push({
      lotId: lot.id,
      quantity: item.quantity,
      unitPrice: lot.unitCost,
      total: lot.unitCost * item.quantity,
    });
  }
  return {
    lines,
    totalUnits: lines.reduce((sum, l) => sum + l.quantity, 0),
    totalPrice: lines.reduce((sum, l) => sum + l.total, 0),
  };
}
