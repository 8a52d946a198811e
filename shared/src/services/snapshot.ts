/**
 * Snapshot Conversion
 *
 * Domain state <-> persisted records. Loading validates with zod, fills the
 * split shipping/tax fields from the combined legacy value, assigns ids to
 * lots that predate them, and recreates transaction records that were never
 * written. Saving writes the combined values alongside the split ones.
 */

import {
    INVENTORY_ERROR_CODES,
    inventoryError,
    inventorySuccess,
    type InventoryResult,
} from '../errors/index.js';
import { buildCatalog, type Catalog } from '../domain/lots/catalog.js';
import { lotShipping, type Lot } from '../domain/lots/types.js';
import { deriveTransactionStatus } from '../domain/ledger/transactionState.js';
import {
    shippingTaxAllocated,
    type LedgerEntry,
    type Transaction,
} from '../domain/ledger/types.js';
import { unitCost } from '../domain/valuation/costModel.js';
import {
    SNAPSHOT_VERSION,
    snapshotSchema,
    type LedgerEntryRecord,
    type LotRecord,
    type Snapshot,
    type TransactionRecord,
} from '../schemas/records.js';

export interface InventoryState {
    lots: Lot[];
    entries: LedgerEntry[];
    transactions: Transaction[];
    catalog: Catalog;
    /** Stored default tax rate; null when the snapshot has none */
    defaultTaxRate: number | null;
}

export interface SnapshotDeps {
    newId: () => string;
    /** Rate given to lots stored without their own */
    fallbackTaxRate: number;
}

export function emptyState(): InventoryState {
    return {
        lots: [],
        entries: [],
        transactions: [],
        catalog: { brands: [], sizes: [], types: [] },
        defaultTaxRate: null,
    };
}

// ============================================
// SAVE
// ============================================

export function toSnapshot(state: InventoryState): Snapshot {
    return {
        version: SNAPSHOT_VERSION,
        lots: state.lots.map(lotToRecord),
        ledger: state.entries.map(entryToRecord),
        transactions: state.transactions.map((t) => ({ ...t })),
        catalog: buildCatalog(state.lots, state.catalog),
        settings: state.defaultTaxRate === null ? {} : { defaultTaxRate: state.defaultTaxRate },
    };
}

function lotToRecord(lot: Lot): LotRecord {
    return {
        id: lot.id,
        brand: lot.brand,
        name: lot.name,
        size: lot.size,
        type: lot.type,
        count: lot.count,
        price: lot.price,
        shipping: lotShipping(lot),
        allocatedShipping: lot.allocatedShipping,
        allocatedTax: lot.allocatedTax,
        taxRate: lot.taxRate,
        unitCost: lot.unitCost,
        originalQuantity: lot.originalQuantity,
        rating: lot.rating,
        history: lot.history.map((event) => ({ ...event })),
    };
}

function entryToRecord(entry: LedgerEntry): LedgerEntryRecord {
    if (entry.kind === 'resupply') {
        return { ...entry, shippingTaxAllocated: shippingTaxAllocated(entry) };
    }
    return { ...entry };
}

// ============================================
// LOAD
// ============================================

/** `null`/`undefined` (nothing stored yet) loads as an empty state */
export function fromSnapshot(raw: unknown, deps: SnapshotDeps): InventoryResult<InventoryState> {
    if (raw === null || raw === undefined) return inventorySuccess(emptyState());

    const parsed = snapshotSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        return inventoryError(
            INVENTORY_ERROR_CODES.INVALID_SNAPSHOT,
            `Stored inventory data is not readable${where}: ${issue?.message ?? 'invalid'}`,
        );
    }

    const snapshot = parsed.data;
    const lots = snapshot.lots.map((record) => lotFromRecord(record, deps));
    const entries = snapshot.ledger.map(entryFromRecord);
    const transactions = withMissingTransactions(snapshot.transactions.map(transactionFromRecord), entries);

    return inventorySuccess<InventoryState>({
        lots,
        entries,
        transactions,
        catalog: snapshot.catalog,
        defaultTaxRate: snapshot.settings.defaultTaxRate ?? null,
    });
}

export function lotFromRecord(record: LotRecord, deps: SnapshotDeps): Lot {
    // Records that only carry the combined value read it as shipping with no tax
    const allocatedShipping = record.allocatedShipping ?? record.shipping;
    const allocatedTax = record.allocatedShipping === undefined ? 0 : (record.allocatedTax ?? 0);
    const taxRate = record.taxRate ?? deps.fallbackTaxRate;
    const originalQuantity = record.originalQuantity ?? null;

    return {
        id: record.id ?? deps.newId(),
        brand: record.brand,
        name: record.name,
        size: record.size,
        type: record.type,
        count: record.count,
        price: record.price,
        allocatedShipping,
        allocatedTax,
        taxRate,
        unitCost: unitCost(record.price, allocatedShipping + allocatedTax, record.count, originalQuantity, taxRate),
        originalQuantity,
        rating: record.rating,
        history: record.history.map((event) => ({ ...event })),
    };
}

function entryFromRecord(record: LedgerEntryRecord): LedgerEntry {
    const base = {
        id: record.id,
        transactionId: record.transactionId,
        timestamp: record.timestamp,
        lotId: record.lotId,
        brand: record.brand,
        name: record.name,
        size: record.size,
        unitPrice: record.unitPrice,
        quantity: record.quantity,
        recordedQuantity: record.recordedQuantity ?? record.quantity,
        totalCost: record.totalCost,
    };

    if (record.kind === 'sale') return { kind: 'sale', ...base };

    const allocatedShipping = record.allocatedShipping ?? record.shippingTaxAllocated;
    return {
        kind: 'resupply',
        ...base,
        price: record.price,
        allocatedShipping,
        allocatedTax: record.allocatedShipping === undefined ? 0 : (record.allocatedTax ?? 0),
    };
}

function transactionFromRecord(record: TransactionRecord): Transaction {
    return { ...record };
}

/** One transaction per orphaned transactionId, in first-seen order */
export function withMissingTransactions(transactions: Transaction[], entries: LedgerEntry[]): Transaction[] {
    const known = new Set(transactions.map((t) => t.id));
    const groups = new Map<string, LedgerEntry[]>();

    for (const entry of entries) {
        if (known.has(entry.transactionId)) continue;
        const group = groups.get(entry.transactionId);
        if (group) group.push(entry);
        else groups.set(entry.transactionId, [entry]);
    }

    for (const [id, group] of groups) {
        const first = group[0];
        transactions.push({
            id,
            kind: first.kind,
            timestamp: first.timestamp,
            status: deriveTransactionStatus(group.length, group),
            entryCount: group.length,
        });
    }
    return transactions;
}
