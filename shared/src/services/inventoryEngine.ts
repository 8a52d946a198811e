/**
 * Inventory Engine
 *
 * Façade over the lot store, the ledger and the engine configuration.
 * Every mutating call runs to completion synchronously, then writes the
 * whole state through the repository. A failed write is logged and reported
 * on the result; the in-memory change is kept.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { EngineConfig } from '../config/engine.js';
import { createEngineConfig } from '../config/engine.js';
import { percentToRate, rateToPercent } from '../domain/constants.js';
import { Ledger, type ResupplyRecord, type ReversalOutcome, type SaleRecord, type TransactionReversal } from '../domain/ledger/ledger.js';
import type { LedgerEntry, LedgerEntryKind, LotInput, SaleEntry, SaleItem, Transaction } from '../domain/ledger/types.js';
import {
    addCatalogValue,
    buildCatalog,
    emptyCatalog,
    type Catalog,
    type CatalogKind,
} from '../domain/lots/catalog.js';
import { filterLots, sortLots, type LotSortColumn, type SortDirection } from '../domain/lots/browse.js';
import { LotStore, parseRating, type EditOutcome, type ResolutionOutcome } from '../domain/lots/lotStore.js';
import type { DuplicateResolution, Lot, LotPatch } from '../domain/lots/types.js';
import { aggregate, type InventoryValuation } from '../domain/valuation/aggregator.js';
import {
    computeUnitCost,
    parseAmount,
    parsePositiveQuantity,
    parseQuantity,
    type CostResult,
    type NumericInput,
    type UnitCostInput,
} from '../domain/valuation/costModel.js';
import { quoteSale, type QuoteItem, type SaleQuote } from '../domain/valuation/shipping.js';
import {
    INVENTORY_ERROR_CODES,
    InventoryError,
    getInventoryErrorMessage,
    inventoryError,
    inventorySuccess,
    type InventoryErrorCode,
    type InventoryErrorResult,
    type InventoryResult,
    type InventorySuccessResult,
} from '../errors/index.js';
import { engineLogger, ledgerLogger, lotsLogger } from '../utils/logger.js';
import type { InventoryRepository } from './persistence.js';
import { fromSnapshot, toSnapshot, type InventoryState } from './snapshot.js';

// ============================================
// TYPES
// ============================================

export type PersistenceStatus =
    | { saved: true }
    | { saved: false; error: { code: InventoryErrorCode; message: string } }
    | { saved: false; unchanged: true };

/** Result of a mutating call: the domain outcome plus whether it reached storage */
export type EngineResult<T> =
    | InventoryErrorResult
    | (InventorySuccessResult<T> & { persistence: PersistenceStatus });

export interface InventoryEngineOptions {
    repository: InventoryRepository;
    config?: EngineConfig;
    /** Parent logger; module children are derived from it */
    logger?: Logger;
    newId?: () => string;
    now?: () => Date;
}

export interface AddLotInput {
    brand: string;
    name: string;
    size: string;
    type?: string;
    count: NumericInput;
    price: NumericInput;
    shipping?: NumericInput;
    tax?: NumericInput;
    rating?: NumericInput;
}

export interface AddLotOutcome {
    lot: Lot;
    /** True when the input matched an existing lot and was merged into it */
    merged: boolean;
}

export interface LoadSummary {
    lots: number;
    entries: number;
    transactions: number;
}

export interface LotSearchOptions {
    column?: LotSortColumn;
    direction?: SortDirection;
}

// ============================================
// ENGINE
// ============================================

export class InventoryEngine {
    private readonly repository: InventoryRepository;
    private readonly config: EngineConfig;
    private readonly log: Logger;
    private readonly lotsLog: Logger;
    private readonly ledgerLog: Logger;
    private readonly newId: () => string;
    private readonly now: () => Date;

    private lotStore: LotStore;
    private ledger: Ledger;
    private extraCatalog: Catalog = emptyCatalog();

    constructor(options: InventoryEngineOptions) {
        this.repository = options.repository;
        this.config = options.config ?? createEngineConfig();
        this.log = options.logger ? options.logger.child({ module: 'engine' }) : engineLogger;
        this.lotsLog = options.logger ? options.logger.child({ module: 'lots' }) : lotsLogger;
        this.ledgerLog = options.logger ? options.logger.child({ module: 'ledger' }) : ledgerLogger;
        this.newId = options.newId ?? randomUUID;
        this.now = options.now ?? (() => new Date());

        this.lotStore = new LotStore([], this.deps());
        this.ledger = new Ledger(this.lotStore, { entries: [], transactions: [] }, this.deps());
    }

    // ============================================
    // STATE
    // ============================================

    /** Replace in-memory state with what the repository holds */
    load(): InventoryResult<LoadSummary> {
        let raw: unknown;
        try {
            raw = this.repository.load();
        } catch (error: unknown) {
            this.log.error({ err: error }, 'Failed to read inventory');
            if (error instanceof InventoryError) return error.toResult();
            return inventoryError(INVENTORY_ERROR_CODES.PERSISTENCE_FAILED, 'Stored inventory could not be read');
        }

        const result = fromSnapshot(raw, { newId: this.newId, fallbackTaxRate: this.config.taxRate });
        if (!result.success) {
            this.log.error({ code: result.error.code }, result.error.message);
            return result;
        }

        const summary = this.restore(result.data);
        this.log.info(summary, 'Inventory loaded');
        return inventorySuccess(summary);
    }

    /** Replace in-memory state (e.g. after a legacy import) and save it */
    replaceState(state: InventoryState): EngineResult<LoadSummary> {
        const summary = this.restore(state);
        this.log.info(summary, 'Inventory replaced');
        return this.persist(summary, 'replaceState');
    }

    state(): InventoryState {
        return {
            lots: [...this.lotStore.all()],
            entries: [...this.ledger.entries()],
            transactions: [...this.ledger.transactions()],
            catalog: this.extraCatalog,
            defaultTaxRate: this.config.taxRate,
        };
    }

    // ============================================
    // COST
    // ============================================

    /** Unit cost at the current default tax rate */
    computeUnitCost(input: UnitCostInput): CostResult {
        return computeUnitCost(input, this.config.taxRate);
    }

    /** Current default tax rate as a fraction */
    taxRate(): number {
        return this.config.taxRate;
    }

    setTaxRate(rate: NumericInput): EngineResult<number> {
        const parsed = parseAmount(rate);
        if (parsed === null) return inventoryError(INVENTORY_ERROR_CODES.INVALID_NUMERIC_INPUT);
        this.config.taxRate = parsed;
        this.log.info({ taxRate: parsed }, 'Default tax rate changed');
        return this.persist(parsed, 'setTaxRate');
    }

    // ============================================
    // LOTS
    // ============================================

    lots(): readonly Lot[] {
        return this.lotStore.all();
    }

    lot(id: string): Lot | undefined {
        return this.lotStore.get(id);
    }

    findDuplicateLot(brand: string, name: string, size: string, excludeId?: string): Lot | undefined {
        return this.lotStore.findDuplicate(brand, name, size, excludeId);
    }

    search(term: string, options: LotSearchOptions = {}): Lot[] {
        return sortLots(filterLots(this.lotStore.all(), term), options.column, options.direction);
    }

    /**
     * Manual add. A lot matching an existing brand/name/size merges into it
     * at the current tax rate instead of creating a second lot.
     */
    addLot(input: AddLotInput): EngineResult<AddLotOutcome> {
        const count = parseQuantity(input.count);
        if (count === null) return inventoryError(INVENTORY_ERROR_CODES.INVALID_QUANTITY, 'Count must be a whole number of 0 or more');

        const price = parseAmount(input.price);
        const shipping = input.shipping === undefined ? 0 : parseAmount(input.shipping);
        const tax = input.tax === undefined ? 0 : parseAmount(input.tax);
        if (price === null || shipping === null || tax === null) {
            return inventoryError(INVENTORY_ERROR_CODES.INVALID_NUMERIC_INPUT);
        }

        const rating = input.rating === undefined ? null : parseRating(input.rating);
        if (rating === undefined) return inventoryError(INVENTORY_ERROR_CODES.INVALID_RATING);

        const taxRate = this.config.taxRate;
        const existing = this.lotStore.findDuplicate(input.brand, input.name, input.size);
        if (existing) {
            this.lotStore.mergeInto(existing, { count, price, shipping, tax, taxRate });
            this.lotsLog.info({ lotId: existing.id, count, price }, 'Merged manual add into existing lot');
            return this.persist<AddLotOutcome>({ lot: existing, merged: true }, 'addLot');
        }

        const lot = this.lotStore.create({
            brand: input.brand,
            name: input.name,
            size: input.size,
            type: input.type,
            count,
            price,
            shipping,
            tax,
            taxRate,
            rating,
        });
        this.lotsLog.info({ lotId: lot.id, count, price }, 'Lot created');
        return this.persist<AddLotOutcome>({ lot, merged: false }, 'addLot');
    }

    /** Fold an incoming purchase into an existing lot at the current tax rate */
    mergeLots(
        lotId: string,
        newCount: NumericInput,
        newPrice: NumericInput,
        newShipping: NumericInput,
        newTax: NumericInput = 0,
    ): EngineResult<Lot> {
        const lot = this.lotStore.get(lotId);
        if (!lot) return inventoryError(INVENTORY_ERROR_CODES.LOT_NOT_FOUND);

        const count = parsePositiveQuantity(newCount);
        if (count === null) return inventoryError(INVENTORY_ERROR_CODES.INVALID_QUANTITY);

        const price = parseAmount(newPrice);
        const shipping = parseAmount(newShipping);
        const tax = parseAmount(newTax);
        if (price === null || shipping === null || tax === null) {
            return inventoryError(INVENTORY_ERROR_CODES.INVALID_NUMERIC_INPUT);
        }

        this.lotStore.mergeInto(lot, { count, price, shipping, tax, taxRate: this.config.taxRate });
        this.lotsLog.info({ lotId, count, price, shipping, tax }, 'Merged purchase into lot');
        return this.persist(lot, 'mergeLots');
    }

    editLot(id: string, patch: LotPatch): EngineResult<EditOutcome> {
        const result = this.lotStore.applyEdit(id, patch);
        if (!result.success) return result;

        const outcome = result.data;
        if (outcome.status === 'conflict') {
            this.lotsLog.info(
                { lotId: id, existingLotId: outcome.conflict.existingLotId },
                'Edit collides with an existing lot',
            );
            return this.unchanged(outcome);
        }
        this.warnRejected(id, outcome.rejected);
        this.lotsLog.info({ lotId: id }, 'Lot edited');
        return this.persist(outcome, 'editLot');
    }

    resolveDuplicate(id: string, patch: LotPatch, resolution: DuplicateResolution): EngineResult<ResolutionOutcome> {
        const result = this.lotStore.resolveDuplicate(id, patch, resolution);
        if (!result.success) return result;

        const outcome = result.data;
        if (outcome.resolution === 'combine') {
            const moved = this.ledger.relinkLot(outcome.removedLotId, outcome.lot.id);
            this.lotsLog.info(
                { removedLotId: outcome.removedLotId, lotId: outcome.lot.id, relinkedEntries: moved },
                'Lots combined',
            );
        } else {
            this.lotsLog.info({ lotId: id, resolution: outcome.resolution }, 'Duplicate resolved');
        }
        if (outcome.resolution === 'cancel') return this.unchanged(outcome);
        this.warnRejected(id, outcome.rejected);
        return this.persist(outcome, 'resolveDuplicate');
    }

    /** Ledger entries of a removed lot stay, and can no longer be reversed */
    removeLot(id: string): EngineResult<Lot> {
        const removed = this.lotStore.remove(id);
        if (!removed) return inventoryError(INVENTORY_ERROR_CODES.LOT_NOT_FOUND);
        this.lotsLog.info({ lotId: id }, 'Lot removed');
        return this.persist(removed, 'removeLot');
    }

    // ============================================
    // CATALOG
    // ============================================

    catalog(): Catalog {
        return buildCatalog(this.lotStore.all(), this.extraCatalog);
    }

    addCatalogValue(kind: CatalogKind, value: string): EngineResult<Catalog> {
        this.extraCatalog = addCatalogValue(this.extraCatalog, kind, value);
        return this.persist(this.catalog(), 'addCatalogValue');
    }

    // ============================================
    // LEDGER
    // ============================================

    entries(kind?: LedgerEntryKind): LedgerEntry[] {
        const all = this.ledger.entries();
        return kind ? all.filter((e) => e.kind === kind) : [...all];
    }

    entriesFor(transactionId: string): LedgerEntry[] {
        return this.ledger.entriesFor(transactionId);
    }

    transactions(): readonly Transaction[] {
        return this.ledger.transactions();
    }

    transaction(id: string): Transaction | undefined {
        return this.ledger.transaction(id);
    }

    salesHistory(): SaleEntry[] {
        return this.ledger.salesHistory();
    }

    quoteSale(items: readonly QuoteItem[]): SaleQuote {
        return quoteSale(this.lotStore.all(), items);
    }

    recordSale(items: readonly SaleItem[]): EngineResult<SaleRecord> {
        const record = this.ledger.recordSale(items);
        const log = record.transactionId ? this.ledgerLog.child({ transactionId: record.transactionId }) : this.ledgerLog;

        for (const entry of record.entries) {
            log.info({ lotId: entry.lotId, quantity: entry.quantity, unitPrice: entry.unitPrice }, 'Sale recorded');
        }
        for (const failure of record.failures) {
            log.warn({ index: failure.index, code: failure.code, ...failure.context }, failure.message);
        }
        if (record.transactionId === null) return this.unchanged(record);
        return this.persist(record, 'recordSale');
    }

    /**
     * Receive a resupply order. The rate defaults to the current default and
     * becomes the new default once the order is accepted.
     */
    recordResupply(
        items: readonly LotInput[],
        totalShipping: number,
        taxRatePercent: number = rateToPercent(this.config.taxRate),
    ): EngineResult<ResupplyRecord> {
        const result = this.ledger.recordResupply(items, totalShipping, taxRatePercent);
        if (!result.success) return result;

        const record = result.data;
        if (record.orderId !== null) this.config.taxRate = percentToRate(taxRatePercent);

        const log = record.orderId ? this.ledgerLog.child({ orderId: record.orderId }) : this.ledgerLog;
        log.info(
            {
                entries: record.entries.length,
                merged: record.mergedLotIds.length,
                created: record.createdLotIds.length,
                totalShipping,
                taxRatePercent,
            },
            'Resupply recorded',
        );
        for (const failure of record.failures) {
            log.warn({ index: failure.index, code: failure.code, ...failure.context }, failure.message);
        }
        if (record.orderId === null) return this.unchanged(record);
        return this.persist(record, 'recordResupply');
    }

    reverseSaleEntry(entryId: string, quantity: number): EngineResult<ReversalOutcome> {
        return this.reverseEntryOfKind('sale', entryId, quantity);
    }

    reverseResupplyEntry(entryId: string, quantity: number): EngineResult<ReversalOutcome> {
        return this.reverseEntryOfKind('resupply', entryId, quantity);
    }

    reverseWholeTransaction(transactionId: string): EngineResult<TransactionReversal> {
        const result = this.ledger.reverseTransaction(transactionId);
        if (!result.success) return result;

        const reversal = result.data;
        const log = this.ledgerLog.child({ transactionId });
        log.info({ reversed: reversal.reversed.length, status: reversal.status }, 'Transaction reversed');
        for (const failure of reversal.failures) {
            log.warn({ index: failure.index, code: failure.code, ...failure.context }, failure.message);
        }
        return this.persist(reversal, 'reverseWholeTransaction');
    }

    // ============================================
    // VALUATION
    // ============================================

    aggregate(): InventoryValuation {
        return aggregate(this.lotStore.all());
    }

    // ============================================
    // INTERNALS
    // ============================================

    private reverseEntryOfKind(kind: LedgerEntryKind, entryId: string, quantity: number): EngineResult<ReversalOutcome> {
        const entry = this.ledger.entry(entryId);
        if (!entry || entry.kind !== kind) return inventoryError(INVENTORY_ERROR_CODES.REVERSAL_NOT_FOUND);

        const result = this.ledger.reverseEntry(entryId, quantity);
        if (!result.success) {
            this.ledgerLog.warn({ entryId, quantity, code: result.error.code }, result.error.message);
            return result;
        }

        const outcome = result.data;
        this.ledgerLog.info(
            { entryId, transactionId: outcome.transactionId, lotId: outcome.lotId, quantity, status: outcome.status },
            kind === 'sale' ? 'Sale reversed' : 'Resupply reversed',
        );
        return this.persist(outcome, kind === 'sale' ? 'reverseSaleEntry' : 'reverseResupplyEntry');
    }

    private restore(state: InventoryState): LoadSummary {
        this.lotStore = new LotStore(state.lots, this.deps());
        this.ledger = new Ledger(
            this.lotStore,
            { entries: state.entries, transactions: state.transactions },
            this.deps(),
        );
        this.extraCatalog = state.catalog;
        if (state.defaultTaxRate !== null) this.config.taxRate = state.defaultTaxRate;
        return {
            lots: state.lots.length,
            entries: state.entries.length,
            transactions: state.transactions.length,
        };
    }

    private persist<T>(data: T, action: string): EngineResult<T> {
        try {
            this.repository.save(toSnapshot(this.state()));
            return { ...inventorySuccess(data), persistence: { saved: true } };
        } catch (error: unknown) {
            this.log.error({ err: error, action }, 'Failed to save inventory');
            const code = INVENTORY_ERROR_CODES.PERSISTENCE_FAILED;
            return {
                ...inventorySuccess(data),
                persistence: { saved: false, error: { code, message: getInventoryErrorMessage(code) } },
            };
        }
    }

    private unchanged<T>(data: T): EngineResult<T> {
        return { ...inventorySuccess(data), persistence: { saved: false, unchanged: true } };
    }

    private warnRejected(lotId: string, rejected: readonly { field: string; code: string; message: string }[]): void {
        for (const r of rejected) {
            this.lotsLog.warn({ lotId, field: r.field, code: r.code }, r.message);
        }
    }

    private deps(): { newId: () => string; now: () => Date } {
        return { newId: this.newId, now: this.now };
    }
}
