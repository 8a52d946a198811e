/**
 * Lot Types
 *
 * A lot is one purchased batch of a cigar variant with a shared cost basis.
 */

import type { NumericInput } from '../valuation/costModel.js';

// ============================================
// LOT
// ============================================

export interface Lot {
    /** Stable generated id; every lookup except duplicate detection uses it */
    id: string;
    brand: string;
    name: string;
    size: string;
    type: string;
    /** Units remaining */
    count: number;
    /** Total price paid (not per unit) */
    price: number;
    /** Shipping allocated to this lot (total, not per unit) */
    allocatedShipping: number;
    /** Tax allocated to this lot at resupply time (total, not per unit) */
    allocatedTax: number;
    /** Tax fraction the lot is costed with (0.086 = 8.6%) */
    taxRate: number;
    /** Derived — see costModel.unitCost */
    unitCost: number;
    /** Shipping amortization base; null on legacy lots (falls back to count) */
    originalQuantity: number | null;
    /** 1–10 */
    rating: number | null;
    history: MergeEvent[];
}

/** Incoming purchase folded into a lot; informational only */
export interface MergeEvent {
    at: string;
    count: number;
    price: number;
    shipping: number;
    tax: number;
    unitCost: number;
}

/** The three fields compared (case-insensitively) for duplicate detection */
export interface LotIdentity {
    brand: string;
    name: string;
    size: string;
}

// ============================================
// INPUTS
// ============================================

export interface NewLotInput extends LotIdentity {
    type?: string;
    count: number;
    price: number;
    shipping?: number;
    tax?: number;
    taxRate: number;
    rating?: number | null;
}

/** Incoming purchase for mergeInto */
export interface MergeInput {
    count: number;
    price: number;
    shipping: number;
    tax?: number;
    /** Rate of the incoming order; the lot keeps its own rate when omitted */
    taxRate?: number;
}

/**
 * Edit from a form. Numeric fields arrive raw and are parsed one by one;
 * a field that fails to parse is rejected on its own.
 */
export interface LotPatch {
    brand?: string;
    name?: string;
    size?: string;
    type?: string;
    count?: NumericInput;
    price?: NumericInput;
    shipping?: NumericInput;
    tax?: NumericInput;
    /** null clears the rating */
    rating?: NumericInput;
}

export type DuplicateResolution = 'combine' | 'keep_separate' | 'cancel';

export const DUPLICATE_RESOLUTIONS: readonly DuplicateResolution[] = ['combine', 'keep_separate', 'cancel'];

/** Combined shipping + tax — the legacy single `shipping` value */
export function lotShipping(lot: Pick<Lot, 'allocatedShipping' | 'allocatedTax'>): number {
    return lot.allocatedShipping + lot.allocatedTax;
}
