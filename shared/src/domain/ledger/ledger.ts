/**
 * Transaction Ledger - Domain Layer
 *
 * Records sales and resupply orders against the lot store, one transaction id
 * per user action, and reverses them in full or in part.
 *
 * Batches are best effort: a line that fails (no stock, bad quantity, missing lot)
 * is skipped and reported; the rest of the batch proceeds.
 *
 * All functions:
 * - Mutate the lot store and the ledger together, never one without the other
 * - Return a result (not throw on validation errors)
 * - Do NOT persist or log (that's the caller's job)
 */

import {
    INVENTORY_ERROR_CODES,
    inventoryError,
    inventorySuccess,
    itemFailure,
    type InventoryResult,
    type ItemFailure,
} from '../../errors/index.js';
import { percentToRate } from '../constants.js';
import type { LotStore } from '../lots/lotStore.js';
import type { Lot } from '../lots/types.js';
import {
    parseAmount,
    parsePositiveQuantity,
    purchaseUnitCost,
} from '../valuation/costModel.js';
import { allocateShippingByUnits } from '../valuation/shipping.js';
import { deriveTransactionStatus, isTerminalStatus, isValidTransactionTransition } from './transactionState.js';
import type {
    LedgerEntry,
    LedgerEntryKind,
    LotInput,
    ResupplyEntry,
    SaleEntry,
    SaleItem,
    Transaction,
    TransactionStatus,
} from './types.js';

// ============================================
// TYPES
// ============================================

export interface LedgerDeps {
    newId: () => string;
    now: () => Date;
}

export interface LedgerState {
    entries: LedgerEntry[];
    transactions: Transaction[];
}

export interface SaleRecord {
    /** null when no line could be sold (nothing was recorded) */
    transactionId: string | null;
    entries: SaleEntry[];
    failures: ItemFailure[];
}

export interface ResupplyRecord {
    /** null when no line was accepted */
    orderId: string | null;
    entries: ResupplyEntry[];
    failures: ItemFailure[];
    /** Existing lots the order merged into */
    mergedLotIds: string[];
    /** Lots the order created */
    createdLotIds: string[];
}

export interface ReversalOutcome {
    entryId: string;
    transactionId: string;
    kind: LedgerEntryKind;
    lotId: string;
    quantity: number;
    /** True when the entry was reversed in full and removed */
    removed: boolean;
    /** Remaining entry after a partial reversal */
    entry: LedgerEntry | null;
    status: TransactionStatus;
}

export interface TransactionReversal {
    transactionId: string;
    reversed: ReversalOutcome[];
    failures: ItemFailure[];
    status: TransactionStatus;
}

// ============================================
// LEDGER
// ============================================

export class Ledger {
    private readonly lotStore: LotStore;
    private readonly deps: LedgerDeps;
    private entryList: LedgerEntry[];
    private transactionList: Transaction[];

    constructor(lotStore: LotStore, state: LedgerState, deps: LedgerDeps) {
        this.lotStore = lotStore;
        this.entryList = state.entries;
        this.transactionList = state.transactions;
        this.deps = deps;
    }

    // ============================================
    // QUERIES
    // ============================================

    entries(): readonly LedgerEntry[] {
        return this.entryList;
    }

    entry(id: string): LedgerEntry | undefined {
        return this.entryList.find((e) => e.id === id);
    }

    entriesFor(transactionId: string): LedgerEntry[] {
        return this.entryList.filter((e) => e.transactionId === transactionId);
    }

    transactions(): readonly Transaction[] {
        return this.transactionList;
    }

    transaction(id: string): Transaction | undefined {
        return this.transactionList.find((t) => t.id === id);
    }

    /** Sale entries, newest first */
    salesHistory(): SaleEntry[] {
        const sales = this.entryList.filter((e): e is SaleEntry => e.kind === 'sale');
        return sales.reverse();
    }

    // ============================================
    // SALES
    // ============================================

    /**
     * Sell units from one or more lots.
     *
     * Each entry's unitPrice is the lot's unit cost at sale time, so later
     * recomputation never rewrites historical figures.
     */
    recordSale(items: readonly SaleItem[]): SaleRecord {
        const transactionId = this.deps.newId();
        const timestamp = this.deps.now().toISOString();
        const entries: SaleEntry[] = [];
        const failures: ItemFailure[] = [];

        items.forEach((item, index) => {
            const quantity = parsePositiveQuantity(item.quantity);
            if (quantity === null) {
                failures.push(itemFailure(index, INVENTORY_ERROR_CODES.INVALID_QUANTITY, { lotId: item.lotId }));
                return;
            }

            const lot = this.lotStore.get(item.lotId);
            if (!lot) {
                failures.push(itemFailure(index, INVENTORY_ERROR_CODES.LOT_NOT_FOUND, { lotId: item.lotId }));
                return;
            }

            if (lot.count < quantity) {
                failures.push(
                    itemFailure(
                        index,
                        INVENTORY_ERROR_CODES.INSUFFICIENT_STOCK,
                        { lotId: lot.id, available: lot.count, requested: quantity },
                        `Not enough stock for ${lot.name}. Only ${lot.count} available.`,
                    ),
                );
                return;
            }

            const unitPrice = lot.unitCost;
            this.lotStore.adjustCount(lot, -quantity);

            entries.push({
                kind: 'sale',
                id: this.deps.newId(),
                transactionId,
                timestamp,
                ...snapshotOf(lot),
                unitPrice,
                quantity,
                recordedQuantity: quantity,
                totalCost: unitPrice * quantity,
            });
        });

        if (entries.length === 0) {
            return { transactionId: null, entries, failures };
        }

        this.entryList.push(...entries);
        this.transactionList.push({
            id: transactionId,
            kind: 'sale',
            timestamp,
            status: 'recorded',
            entryCount: entries.length,
        });

        return { transactionId, entries, failures };
    }

    // ============================================
    // RESUPPLY
    // ============================================

    /**
     * Receive a resupply order.
     *
     * - Shipping is split across lines in proportion to unit count
     * - Tax is charged on each line's base price only: price × rate
     * - A line matching an existing lot (brand/name/size) merges into it;
     *   otherwise a new lot is created with originalQuantity = count
     */
    recordResupply(
        items: readonly LotInput[],
        totalShipping: number,
        taxRatePercent: number,
    ): InventoryResult<ResupplyRecord> {
        const shippingTotal = parseAmount(totalShipping);
        const ratePercent = parseAmount(taxRatePercent);
        if (shippingTotal === null || ratePercent === null) {
            return inventoryError(INVENTORY_ERROR_CODES.INVALID_NUMERIC_INPUT);
        }

        const failures: ItemFailure[] = [];
        const accepted: Array<{ input: LotInput; count: number; price: number }> = [];

        items.forEach((input, index) => {
            const count = parsePositiveQuantity(input.count);
            if (count === null) {
                failures.push(itemFailure(index, INVENTORY_ERROR_CODES.INVALID_QUANTITY, { name: input.name }));
                return;
            }
            const price = parseAmount(input.price);
            if (price === null) {
                failures.push(itemFailure(index, INVENTORY_ERROR_CODES.INVALID_NUMERIC_INPUT, { name: input.name, field: 'price' }));
                return;
            }
            accepted.push({ input, count, price });
        });

        if (accepted.length === 0) {
            return inventorySuccess<ResupplyRecord>({
                orderId: null,
                entries: [],
                failures,
                mergedLotIds: [],
                createdLotIds: [],
            });
        }

        const orderId = this.deps.newId();
        const timestamp = this.deps.now().toISOString();
        const taxRate = percentToRate(ratePercent);
        const shipping = allocateShippingByUnits(shippingTotal, accepted.map((a) => a.count));
        const entries: ResupplyEntry[] = [];
        const mergedLotIds: string[] = [];
        const createdLotIds: string[] = [];

        accepted.forEach(({ input, count, price }, i) => {
            const allocatedShipping = shipping[i];
            const allocatedTax = price * taxRate;

            let lot = this.lotStore.findDuplicate(input.brand, input.name, input.size);
            if (lot) {
                this.lotStore.mergeInto(lot, {
                    count,
                    price,
                    shipping: allocatedShipping,
                    tax: allocatedTax,
                    taxRate,
                });
                mergedLotIds.push(lot.id);
            } else {
                lot = this.lotStore.create({
                    brand: input.brand,
                    name: input.name,
                    size: input.size,
                    type: input.type,
                    count,
                    price,
                    shipping: allocatedShipping,
                    tax: allocatedTax,
                    taxRate,
                    rating: input.rating ?? null,
                });
                createdLotIds.push(lot.id);
            }

            const unitPrice = purchaseUnitCost(count, price, allocatedShipping, allocatedTax, taxRate);
            entries.push({
                kind: 'resupply',
                id: this.deps.newId(),
                transactionId: orderId,
                timestamp,
                ...snapshotOf(lot),
                unitPrice,
                quantity: count,
                recordedQuantity: count,
                totalCost: unitPrice * count,
                price,
                allocatedShipping,
                allocatedTax,
            });
        });

        this.entryList.push(...entries);
        this.transactionList.push({
            id: orderId,
            kind: 'resupply',
            timestamp,
            status: 'recorded',
            entryCount: entries.length,
            totalShipping: shippingTotal,
            taxRatePercent: ratePercent,
        });

        return inventorySuccess<ResupplyRecord>({ orderId, entries, failures, mergedLotIds, createdLotIds });
    }

    // ============================================
    // REVERSAL
    // ============================================

    /**
     * Return units of a sale to stock, or remove units of a resupply.
     *
     * A fully reversed entry is removed, so reversing it again reports
     * REVERSAL_NOT_FOUND instead of applying twice.
     */
    reverseEntry(entryId: string, quantity: number): InventoryResult<ReversalOutcome> {
        const entry = this.entry(entryId);
        if (!entry) return inventoryError(INVENTORY_ERROR_CODES.REVERSAL_NOT_FOUND);

        const qty = parsePositiveQuantity(quantity);
        if (qty === null || qty > entry.quantity) {
            return inventoryError(
                INVENTORY_ERROR_CODES.INVALID_QUANTITY,
                `Reversal quantity must be between 1 and ${entry.quantity}`,
            );
        }

        const lot = entry.lotId ? this.lotStore.get(entry.lotId) : undefined;
        if (!lot) return inventoryError(INVENTORY_ERROR_CODES.LOT_NOT_FOUND);

        if (entry.kind === 'resupply' && lot.count < qty) {
            return inventoryError(
                INVENTORY_ERROR_CODES.INSUFFICIENT_STOCK,
                `Cannot remove ${qty} of ${lot.name}. Only ${lot.count} in stock.`,
            );
        }

        this.lotStore.adjustCount(lot, entry.kind === 'sale' ? qty : -qty);

        const removed = qty === entry.quantity;
        if (removed) {
            this.entryList = this.entryList.filter((e) => e.id !== entry.id);
        } else {
            shrinkEntry(entry, entry.quantity - qty);
        }

        const status = this.advanceTransaction(entry, removed);

        return inventorySuccess<ReversalOutcome>({
            entryId: entry.id,
            transactionId: entry.transactionId,
            kind: entry.kind,
            lotId: lot.id,
            quantity: qty,
            removed,
            entry: removed ? null : entry,
            status,
        });
    }

    /**
     * Reverse every remaining entry of a transaction in full.
     * Entries that cannot be reversed (e.g. resupplied stock already sold) are
     * reported and left in place.
     */
    reverseTransaction(transactionId: string): InventoryResult<TransactionReversal> {
        const transaction = this.transaction(transactionId);
        if (!transaction || isTerminalStatus(transaction.status)) {
            return inventoryError(INVENTORY_ERROR_CODES.REVERSAL_NOT_FOUND);
        }

        const reversed: ReversalOutcome[] = [];
        const failures: ItemFailure[] = [];

        this.entriesFor(transactionId).forEach((entry, index) => {
            const result = this.reverseEntry(entry.id, entry.quantity);
            if (result.success) {
                reversed.push(result.data);
            } else {
                failures.push(
                    itemFailure(index, result.error.code, { entryId: entry.id, lotId: entry.lotId }, result.error.message),
                );
            }
        });

        return inventorySuccess<TransactionReversal>({
            transactionId,
            reversed,
            failures,
            status: transaction.status,
        });
    }

    /** Point entries of a lot that was combined into another at the surviving lot */
    relinkLot(fromLotId: string, toLotId: string): number {
        let moved = 0;
        for (const entry of this.entryList) {
            if (entry.lotId === fromLotId) {
                entry.lotId = toLotId;
                moved += 1;
            }
        }
        return moved;
    }

    private advanceTransaction(entry: LedgerEntry, removed: boolean): TransactionStatus {
        let transaction = this.transaction(entry.transactionId);
        if (!transaction) {
            // Entries restored without their transaction record
            transaction = {
                id: entry.transactionId,
                kind: entry.kind,
                timestamp: entry.timestamp,
                status: 'recorded',
                entryCount: this.entriesFor(entry.transactionId).length + (removed ? 1 : 0),
            };
            this.transactionList.push(transaction);
        }

        const next = deriveTransactionStatus(transaction.entryCount, this.entriesFor(transaction.id));
        if (next !== transaction.status && isValidTransactionTransition(transaction.status, next)) {
            transaction.status = next;
        }
        return transaction.status;
    }
}

// ============================================
// HELPERS
// ============================================

function snapshotOf(lot: Lot): { lotId: string; brand: string; name: string; size: string } {
    return { lotId: lot.id, brand: lot.brand, name: lot.name, size: lot.size };
}

/**
 * Reduce an entry to `newQuantity`.
 * Sales recompute the total from unitPrice; resupply lines scale every
 * amount by newQuantity / oldQuantity.
 */
function shrinkEntry(entry: LedgerEntry, newQuantity: number): void {
    if (entry.kind === 'resupply') {
        const ratio = newQuantity / entry.quantity;
        entry.price *= ratio;
        entry.allocatedShipping *= ratio;
        entry.allocatedTax *= ratio;
        entry.totalCost *= ratio;
    } else {
        entry.totalCost = entry.unitPrice * newQuantity;
    }
    entry.quantity = newQuantity;
}
