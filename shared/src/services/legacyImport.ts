/**
 * Legacy Import
 *
 * Converts the original desktop application's files into inventory state.
 *
 * - Lots get fresh ids; the combined `shipping` becomes allocatedShipping
 * - Sales of the same second shared one undo group, so they share the
 *   transaction id `legacy-<date>`
 * - A sale is linked to the lot with the same brand/name/size; sales of lots
 *   that were since deleted keep lotId null
 */

import {
    INVENTORY_ERROR_CODES,
    inventoryError,
    inventorySuccess,
    type InventoryResult,
} from '../errors/index.js';
import { RATING_MAX, RATING_MIN } from '../domain/constants.js';
import { sameIdentity } from '../domain/lots/identity.js';
import { buildCatalog } from '../domain/lots/catalog.js';
import type { Lot } from '../domain/lots/types.js';
import type { SaleEntry } from '../domain/ledger/types.js';
import { unitCost } from '../domain/valuation/costModel.js';
import {
    legacyCatalogListSchema,
    legacyInventorySchema,
    legacySalesSchema,
    type LegacyLot,
    type LegacySale,
} from '../schemas/legacy.js';
import { emptyState, withMissingTransactions, type InventoryState } from './snapshot.js';

/** Parsed JSON of each legacy file; a missing file is undefined */
export interface LegacyFiles {
    inventory?: unknown;
    sales?: unknown;
    brands?: unknown;
    sizes?: unknown;
    types?: unknown;
}

export interface LegacyImportDeps {
    newId: () => string;
    /** Rate the old application costed every lot with */
    taxRate: number;
}

export const LEGACY_FILE_NAMES = {
    inventory: 'cigar_inventory.json',
    sales: 'sales_history.json',
    brands: 'cigar_brands.json',
    sizes: 'cigar_sizes.json',
    types: 'cigar_types.json',
} as const satisfies Record<keyof LegacyFiles, string>;

export const LEGACY_FILE_KEYS: readonly (keyof LegacyFiles)[] = ['inventory', 'sales', 'brands', 'sizes', 'types'];

export function legacyTransactionId(date: string): string {
    return `legacy-${date}`;
}

export function importLegacy(files: LegacyFiles, deps: LegacyImportDeps): InventoryResult<InventoryState> {
    const inventory = legacyInventorySchema.safeParse(files.inventory ?? []);
    if (!inventory.success) {
        return inventoryError(INVENTORY_ERROR_CODES.INVALID_SNAPSHOT, `${LEGACY_FILE_NAMES.inventory}: ${inventory.error.issues[0]?.message}`);
    }
    const sales = legacySalesSchema.safeParse(files.sales ?? []);
    if (!sales.success) {
        return inventoryError(INVENTORY_ERROR_CODES.INVALID_SNAPSHOT, `${LEGACY_FILE_NAMES.sales}: ${sales.error.issues[0]?.message}`);
    }

    const lists = {
        brands: legacyCatalogListSchema.safeParse(files.brands ?? []),
        sizes: legacyCatalogListSchema.safeParse(files.sizes ?? []),
        types: legacyCatalogListSchema.safeParse(files.types ?? []),
    };

    const state = emptyState();
    state.lots = inventory.data.map((record) => lotFromLegacy(record, deps));
    state.entries = sales.data.map((record) => saleFromLegacy(record, state.lots, deps));
    state.transactions = withMissingTransactions([], state.entries);
    state.catalog = buildCatalog(state.lots, {
        brands: lists.brands.success ? lists.brands.data : [],
        sizes: lists.sizes.success ? lists.sizes.data : [],
        types: lists.types.success ? lists.types.data : [],
    });
    state.defaultTaxRate = deps.taxRate;

    return inventorySuccess(state);
}

function lotFromLegacy(record: LegacyLot, deps: LegacyImportDeps): Lot {
    const originalQuantity = record.original_quantity ?? null;
    return {
        id: deps.newId(),
        brand: record.brand.trim(),
        name: record.cigar.trim(),
        size: record.size.trim(),
        type: record.type.trim(),
        count: record.count,
        price: record.price,
        allocatedShipping: record.shipping,
        allocatedTax: 0,
        taxRate: deps.taxRate,
        unitCost: unitCost(record.price, record.shipping, record.count, originalQuantity, deps.taxRate),
        originalQuantity,
        rating: legacyRating(record.personal_rating),
        history: [],
    };
}

function saleFromLegacy(record: LegacySale, lots: readonly Lot[], deps: LegacyImportDeps): SaleEntry {
    const identity = { brand: record.brand, name: record.cigar, size: record.size };
    const lot = lots.find((l) => sameIdentity(l, identity));
    return {
        kind: 'sale',
        id: deps.newId(),
        transactionId: legacyTransactionId(record.date),
        timestamp: legacyTimestamp(record.date),
        lotId: lot ? lot.id : null,
        brand: record.brand,
        name: record.cigar,
        size: record.size,
        unitPrice: record.price_per_stick,
        quantity: record.quantity,
        recordedQuantity: record.quantity,
        totalCost: record.total_cost ?? record.price_per_stick * record.quantity,
    };
}

/** Old ratings were floats from a free-text dialog; out-of-range values are dropped */
function legacyRating(value: number | null | undefined): number | null {
    if (value === null || value === undefined || !Number.isFinite(value)) return null;
    const rounded = Math.round(value);
    return rounded >= RATING_MIN && rounded <= RATING_MAX ? rounded : null;
}

/** "2024-03-01 14:05:09" → "2024-03-01T14:05:09" */
export function legacyTimestamp(date: string): string {
    return date.trim().replace(' ', 'T');
}
