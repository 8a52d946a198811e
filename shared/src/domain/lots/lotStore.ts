/**
 * Lot Store - Domain Layer
 *
 * Owns the in-memory list of lots: creation, duplicate detection, merge,
 * and the edit flow with its combine / keep-separate / cancel decision point.
 *
 * All functions:
 * - Mutate lots in place and recompute unit cost after every cost-affecting change
 * - Return a result (not throw on validation errors)
 * - Do NOT touch the ledger or persistence (that's the caller's job)
 */

import {
    INVENTORY_ERROR_CODES,
    getInventoryErrorMessage,
    inventoryError,
    inventorySuccess,
    type InventoryErrorCode,
    type InventoryResult,
} from '../../errors/index.js';
import { RATING_MAX, RATING_MIN } from '../constants.js';
import {
    parseAmount,
    parseQuantity,
    purchaseUnitCost,
    unitCost,
    type NumericInput,
} from '../valuation/costModel.js';
import { nextDisambiguatedName, sameIdentity } from './identity.js';
import {
    DUPLICATE_RESOLUTIONS,
    lotShipping,
    type DuplicateResolution,
    type Lot,
    type LotIdentity,
    type LotPatch,
    type MergeEvent,
    type MergeInput,
    type NewLotInput,
} from './types.js';

// ============================================
// TYPES
// ============================================

export interface LotStoreDeps {
    newId: () => string;
    now: () => Date;
}

export interface FieldRejection {
    field: keyof LotPatch;
    code: InventoryErrorCode;
    message: string;
}

export interface DuplicateLotConflict {
    code: typeof INVENTORY_ERROR_CODES.DUPLICATE_LOT_CONFLICT;
    message: string;
    /** The lot being edited */
    lotId: string;
    /** The lot the edit would collide with */
    existingLotId: string;
    options: readonly DuplicateResolution[];
}

export type EditOutcome =
    | { status: 'applied'; lot: Lot; rejected: FieldRejection[] }
    | { status: 'conflict'; conflict: DuplicateLotConflict };

export type ResolutionOutcome =
    | { resolution: 'combine'; lot: Lot; removedLotId: string; rejected: FieldRejection[] }
    | { resolution: 'keep_separate'; lot: Lot; rejected: FieldRejection[] }
    | { resolution: 'cancel'; lot: Lot };

interface ParsedPatch {
    identity: Partial<LotIdentity>;
    type?: string;
    count?: number;
    price?: number;
    shipping?: number;
    tax?: number;
    rating?: number | null;
    rejected: FieldRejection[];
}

// ============================================
// LOT STORE
// ============================================

export class LotStore {
    private lots: Lot[];
    private readonly deps: LotStoreDeps;

    constructor(lots: Lot[], deps: LotStoreDeps) {
        this.lots = lots;
        this.deps = deps;
    }

    all(): readonly Lot[] {
        return this.lots;
    }

    get(id: string): Lot | undefined {
        return this.lots.find((lot) => lot.id === id);
    }

    /**
     * Case-insensitive match on brand, name and size.
     * `excludeId` lets an edit look for a *different* lot it now collides with.
     */
    findDuplicate(brand: string, name: string, size: string, excludeId?: string): Lot | undefined {
        return this.lots.find(
            (lot) => lot.id !== excludeId && sameIdentity(lot, { brand, name, size }),
        );
    }

    create(input: NewLotInput): Lot {
        const shipping = input.shipping ?? 0;
        const tax = input.tax ?? 0;
        const lot: Lot = {
            id: this.deps.newId(),
            brand: input.brand.trim(),
            name: input.name.trim(),
            size: input.size.trim(),
            type: (input.type ?? '').trim(),
            count: input.count,
            price: input.price,
            allocatedShipping: shipping,
            allocatedTax: tax,
            taxRate: input.taxRate,
            unitCost: 0,
            originalQuantity: input.count,
            rating: input.rating ?? null,
            history: [],
        };
        this.recompute(lot);
        this.lots.push(lot);
        return lot;
    }

    /**
     * Fold a new purchase into an existing lot.
     *
     * - Stocked lot: totals are summed (prices are totals, not averages) and the
     *   amortization base resets to the combined count
     * - Empty lot: the incoming purchase replaces the stale values
     *
     * Returns the history event appended to the lot.
     */
    mergeInto(lot: Lot, incoming: MergeInput): MergeEvent {
        const tax = incoming.tax ?? 0;
        const taxRate = incoming.taxRate ?? lot.taxRate;

        if (lot.count > 0) {
            lot.count += incoming.count;
            lot.price += incoming.price;
            lot.allocatedShipping += incoming.shipping;
            lot.allocatedTax += tax;
        } else {
            lot.count = incoming.count;
            lot.price = incoming.price;
            lot.allocatedShipping = incoming.shipping;
            lot.allocatedTax = tax;
        }
        lot.originalQuantity = lot.count;
        lot.taxRate = taxRate;
        this.recompute(lot);

        const event: MergeEvent = {
            at: this.deps.now().toISOString(),
            count: incoming.count,
            price: incoming.price,
            shipping: incoming.shipping,
            tax,
            unitCost: purchaseUnitCost(incoming.count, incoming.price, incoming.shipping, tax, taxRate),
        };
        lot.history.push(event);
        return event;
    }

    recompute(lot: Lot): void {
        lot.unitCost = unitCost(lot.price, lotShipping(lot), lot.count, lot.originalQuantity, lot.taxRate);
    }

    /** Add (or with a negative delta, remove) units. Callers check stock first. */
    adjustCount(lot: Lot, delta: number): void {
        lot.count += delta;
        this.recompute(lot);
    }

    remove(id: string): Lot | undefined {
        const index = this.lots.findIndex((lot) => lot.id === id);
        if (index === -1) return undefined;
        const [removed] = this.lots.splice(index, 1);
        return removed;
    }

    /** Recompute every lot, e.g. after loading records written by another version */
    recomputeAll(): void {
        for (const lot of this.lots) this.recompute(lot);
    }

    // ============================================
    // EDIT FLOW
    // ============================================

    /**
     * Apply a form edit. If brand/name/size now collide with another lot,
     * nothing is applied and the conflict is returned for the caller to decide.
     */
    applyEdit(id: string, patch: LotPatch): InventoryResult<EditOutcome> {
        const lot = this.get(id);
        if (!lot) return inventoryError(INVENTORY_ERROR_CODES.LOT_NOT_FOUND);

        const parsed = parsePatch(patch);
        const next = { ...identityOf(lot), ...parsed.identity };

        if (hasIdentityChange(lot, parsed.identity)) {
            const duplicate = this.findDuplicate(next.brand, next.name, next.size, id);
            if (duplicate) {
                return inventorySuccess<EditOutcome>({
                    status: 'conflict',
                    conflict: {
                        code: INVENTORY_ERROR_CODES.DUPLICATE_LOT_CONFLICT,
                        message: getInventoryErrorMessage(INVENTORY_ERROR_CODES.DUPLICATE_LOT_CONFLICT),
                        lotId: id,
                        existingLotId: duplicate.id,
                        options: DUPLICATE_RESOLUTIONS,
                    },
                });
            }
        }

        this.applyParsed(lot, parsed, next);
        return inventorySuccess<EditOutcome>({ status: 'applied', lot, rejected: parsed.rejected });
    }

    /**
     * Settle a duplicate conflict raised by applyEdit.
     *
     * - combine: the edited lot (with its numeric edits) is merged into the existing one and deleted
     * - keep_separate: the edit applies with a "(n)" suffix on the name
     * - cancel: nothing changes
     */
    resolveDuplicate(
        id: string,
        patch: LotPatch,
        resolution: DuplicateResolution,
    ): InventoryResult<ResolutionOutcome> {
        const lot = this.get(id);
        if (!lot) return inventoryError(INVENTORY_ERROR_CODES.LOT_NOT_FOUND);

        if (resolution === 'cancel') {
            return inventorySuccess<ResolutionOutcome>({ resolution: 'cancel', lot });
        }

        const parsed = parsePatch(patch);
        const next = { ...identityOf(lot), ...parsed.identity };
        const existing = this.findDuplicate(next.brand, next.name, next.size, id);

        if (resolution === 'combine') {
            if (!existing) {
                // Collision went away in the meantime; a plain edit is all that is left to do
                this.applyParsed(lot, parsed, next);
                return inventorySuccess<ResolutionOutcome>({ resolution: 'keep_separate', lot, rejected: parsed.rejected });
            }
            this.applyParsed(lot, { ...parsed, identity: {} }, identityOf(lot));
            this.mergeInto(existing, {
                count: lot.count,
                price: lot.price,
                shipping: lot.allocatedShipping,
                tax: lot.allocatedTax,
                taxRate: lot.taxRate,
            });
            this.remove(lot.id);
            return inventorySuccess<ResolutionOutcome>({
                resolution: 'combine',
                lot: existing,
                removedLotId: lot.id,
                rejected: parsed.rejected,
            });
        }

        const name = existing ? this.disambiguateName(next, id) : next.name;
        this.applyParsed(lot, parsed, { ...next, name });
        return inventorySuccess<ResolutionOutcome>({ resolution: 'keep_separate', lot, rejected: parsed.rejected });
    }

    /** First "<name> (n)" (n = 2, 3, …) that collides with no other lot */
    disambiguateName(identity: LotIdentity, excludeId?: string): string {
        let attempt = 2;
        let candidate = nextDisambiguatedName(identity.name, attempt);
        while (this.findDuplicate(identity.brand, candidate, identity.size, excludeId)) {
            attempt += 1;
            candidate = nextDisambiguatedName(identity.name, attempt);
        }
        return candidate;
    }

    private applyParsed(lot: Lot, parsed: ParsedPatch, identity: LotIdentity): void {
        lot.brand = identity.brand.trim();
        lot.name = identity.name.trim();
        lot.size = identity.size.trim();
        if (parsed.type !== undefined) lot.type = parsed.type.trim();
        if (parsed.price !== undefined) lot.price = parsed.price;
        if (parsed.shipping !== undefined) lot.allocatedShipping = parsed.shipping;
        if (parsed.tax !== undefined) lot.allocatedTax = parsed.tax;
        if (parsed.rating !== undefined) lot.rating = parsed.rating;
        if (parsed.count !== undefined) {
            lot.count = parsed.count;
            // A lot with no amortization base yet takes the first count it is given
            if (!lot.originalQuantity) lot.originalQuantity = parsed.count;
        }
        this.recompute(lot);
    }
}

// ============================================
// HELPERS
// ============================================

function identityOf(lot: Lot): LotIdentity {
    return { brand: lot.brand, name: lot.name, size: lot.size };
}

function hasIdentityChange(lot: Lot, identity: Partial<LotIdentity>): boolean {
    return (
        (identity.brand !== undefined && identity.brand !== lot.brand) ||
        (identity.name !== undefined && identity.name !== lot.name) ||
        (identity.size !== undefined && identity.size !== lot.size)
    );
}

function parsePatch(patch: LotPatch): ParsedPatch {
    const parsed: ParsedPatch = { identity: {}, rejected: [] };

    if (patch.brand !== undefined) parsed.identity.brand = patch.brand;
    if (patch.name !== undefined) parsed.identity.name = patch.name;
    if (patch.size !== undefined) parsed.identity.size = patch.size;
    if (patch.type !== undefined) parsed.type = patch.type;

    const amounts = ['price', 'shipping', 'tax'] as const;
    for (const field of amounts) {
        if (patch[field] === undefined) continue;
        const value = parseAmount(patch[field]);
        if (value === null) {
            parsed.rejected.push(rejection(field, INVENTORY_ERROR_CODES.INVALID_NUMERIC_INPUT));
        } else {
            parsed[field] = value;
        }
    }

    if (patch.count !== undefined) {
        const count = parseQuantity(patch.count);
        if (count === null) {
            parsed.rejected.push(rejection('count', INVENTORY_ERROR_CODES.INVALID_NUMERIC_INPUT));
        } else {
            parsed.count = count;
        }
    }

    if (patch.rating !== undefined) {
        const rating = parseRating(patch.rating);
        if (rating === undefined) {
            parsed.rejected.push(rejection('rating', INVENTORY_ERROR_CODES.INVALID_RATING));
        } else {
            parsed.rating = rating;
        }
    }

    return parsed;
}

/** null/'' clears; undefined means the value is invalid */
export function parseRating(input: NumericInput): number | null | undefined {
    if (input === null || input === '') return null;
    const value = parseQuantity(input);
    if (value === null || value < RATING_MIN || value > RATING_MAX) return undefined;
    return value;
}

function rejection(field: keyof LotPatch, code: InventoryErrorCode): FieldRejection {
    return { field, code, message: getInventoryErrorMessage(code) };
}
