/**
 * Ledger Types
 *
 * Entries reference lots by stable id; brand/name/size are a snapshot taken
 * at event time for display.
 */

// ============================================
// ENTRIES
// ============================================

export type LedgerEntryKind = 'sale' | 'resupply';

interface LedgerEntryBase {
    id: string;
    /** Shared by every entry created in one sale or one resupply order */
    transactionId: string;
    /** ISO-8601 */
    timestamp: string;
    /** null when a legacy record could not be matched to a lot */
    lotId: string | null;
    brand: string;
    name: string;
    size: string;
    /** Per-unit price captured at event time; later recomputes never change it */
    unitPrice: number;
    /** Current quantity, reduced by partial reversals */
    quantity: number;
    /** Quantity when the entry was created */
    recordedQuantity: number;
    totalCost: number;
}

export interface SaleEntry extends LedgerEntryBase {
    kind: 'sale';
}

export interface ResupplyEntry extends LedgerEntryBase {
    kind: 'resupply';
    /** Total price of this order line */
    price: number;
    allocatedShipping: number;
    allocatedTax: number;
}

export type LedgerEntry = SaleEntry | ResupplyEntry;

/** Combined shipping + tax of a resupply line (the legacy single field) */
export function shippingTaxAllocated(entry: Pick<ResupplyEntry, 'allocatedShipping' | 'allocatedTax'>): number {
    return entry.allocatedShipping + entry.allocatedTax;
}

// ============================================
// TRANSACTIONS
// ============================================

export type TransactionStatus = 'recorded' | 'partially_reversed' | 'fully_reversed';

export interface Transaction {
    id: string;
    kind: LedgerEntryKind;
    timestamp: string;
    status: TransactionStatus;
    /** Entries created by the transaction */
    entryCount: number;
    /** Resupply orders only */
    totalShipping?: number;
    /** Resupply orders only, e.g. 8.6 */
    taxRatePercent?: number;
}

// ============================================
// INPUTS
// ============================================

export interface SaleItem {
    lotId: string;
    quantity: number;
}

/** One line of a resupply order */
export interface LotInput {
    brand: string;
    name: string;
    size: string;
    type?: string;
    count: number;
    /** Total price for the line */
    price: number;
    rating?: number | null;
}
