/**
 * Valuation Aggregator — Pure Functions
 *
 * Rollups over the current lots. Recomputed on every call; nothing is cached,
 * so the figures always match the lot state.
 */

import { lotShipping, type Lot } from '../lots/types.js';

export interface InventoryValuation {
  /** Units on hand across all lots */
  totalCount: number;
  /** Σ unitCost × count over stocked lots */
  totalValue: number;
  /** Plain mean of lot shipping over stocked lots (not weighted by count) */
  averageShipping: number;
  /** totalValue / totalCount */
  averageUnitCost: number;
}

function stocked(lots: readonly Lot[]): Lot[] {
  return lots.filter((lot) => lot.count > 0);
}

export function totalCount(lots: readonly Lot[]): number {
  return lots.reduce((sum, lot) => sum + lot.count, 0);
}

export function totalValue(lots: readonly Lot[]): number {
  return stocked(lots).reduce((sum, lot) => sum + lot.unitCost * lot.count, 0);
}

/**
 * Unweighted: a 2-unit lot counts as much as a 50-unit lot.
 * Callers wanting a per-unit figure should use averageUnitCost.
 */
export function averageShipping(lots: readonly Lot[]): number {
  const withStock = stocked(lots);
  if (withStock.length === 0) return 0;
  return withStock.reduce((sum, lot) => sum + lotShipping(lot), 0) / withStock.length;
}

export function averageUnitCost(lots: readonly Lot[]): number {
  const count = totalCount(lots);
  return count > 0 ? totalValue(lots) / count : 0;
}

export function aggregate(lots: readonly Lot[]): InventoryValuation {
  return {
    totalCount: totalCount(lots),
    totalValue: totalValue(lots),
    averageShipping: averageShipping(lots),
    averageUnitCost: averageUnitCost(lots),
  };
}
