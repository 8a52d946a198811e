/**
 * Unit tests for the lot store: duplicate detection, merge and the edit flow
 */

import { LotStore, parseRating } from '../lotStore.js';
import { nextDisambiguatedName } from '../identity.js';
import type { Lot } from '../types.js';
import { INVENTORY_ERROR_CODES } from '../../../errors/index.js';

function makeStore(lots: Lot[] = []): LotStore {
    let seq = 0;
    return new LotStore(lots, {
        newId: () => `lot-${++seq}`,
        now: () => new Date('2024-05-01T12:00:00.000Z'),
    });
}

function seed(store: LotStore, name: string, count = 10, price = 50, shipping = 10): Lot {
    return store.create({ brand: 'Padron', name, size: 'Robusto', count, price, shipping, taxRate: 0.086 });
}

describe('LotStore.create', () => {
    it('trims text, sets the amortization base and computes unit cost', () => {
        const store = makeStore();
        const lot = store.create({
            brand: ' Padron ',
            name: '1926',
            size: 'Robusto ',
            count: 10,
            price: 50,
            shipping: 10,
            tax: 4.3,
            taxRate: 0.086,
        });

        expect(lot.id).toBe('lot-1');
        expect(lot.brand).toBe('Padron');
        expect(lot.size).toBe('Robusto');
        expect(lot.originalQuantity).toBe(10);
        expect(lot.rating).toBeNull();
        expect(lot.unitCost).toBeCloseTo(6.86, 10);
        expect(store.all()).toHaveLength(1);
    });
});

describe('LotStore.findDuplicate', () => {
    it('matches brand, name and size case-insensitively after trimming', () => {
        const store = makeStore();
        const lot = seed(store, '1926');

        expect(store.findDuplicate('PADRON', ' 1926 ', 'robusto')).toBe(lot);
        expect(store.findDuplicate('Padron', '1926', 'Toro')).toBeUndefined();
    });

    it('skips the excluded lot', () => {
        const store = makeStore();
        const lot = seed(store, '1926');
        expect(store.findDuplicate('Padron', '1926', 'Robusto', lot.id)).toBeUndefined();
    });
});

describe('LotStore.mergeInto', () => {
    it('sums totals into a stocked lot and resets the amortization base', () => {
        const store = makeStore();
        const lot = seed(store, '1926', 10, 50, 10);

        const event = store.mergeInto(lot, { count: 5, price: 30, shipping: 5 });

        expect(lot.count).toBe(15);
        expect(lot.price).toBe(80);
        expect(lot.allocatedShipping).toBe(15);
        expect(lot.originalQuantity).toBe(15);
        // 80 / 15 × 1.086 + 15 / 15
        expect(lot.unitCost).toBeCloseTo(6.792, 10);
        // 30 / 5 × 1.086 + 5 / 5
        expect(event.unitCost).toBeCloseTo(7.516, 10);
        expect(event.at).toBe('2024-05-01T12:00:00.000Z');
        expect(lot.history).toEqual([event]);
    });

    it('replaces stale values on an empty lot', () => {
        const store = makeStore();
        const lot = seed(store, '1926', 0, 99, 9);

        store.mergeInto(lot, { count: 10, price: 50, shipping: 10, tax: 4.3, taxRate: 0.086 });

        expect(lot.count).toBe(10);
        expect(lot.price).toBe(50);
        expect(lot.allocatedShipping).toBe(10);
        expect(lot.allocatedTax).toBe(4.3);
        expect(lot.unitCost).toBeCloseTo(6.86, 10);
    });

    it('keeps the lot rate when the purchase carries none', () => {
        const store = makeStore();
        const lot = seed(store, '1926');
        store.mergeInto(lot, { count: 1, price: 5, shipping: 0 });
        expect(lot.taxRate).toBe(0.086);

        store.mergeInto(lot, { count: 1, price: 5, shipping: 0, taxRate: 0.1 });
        expect(lot.taxRate).toBe(0.1);
    });
});

describe('LotStore.adjustCount', () => {
    it('recomputes unit cost with the new count', () => {
        const store = makeStore();
        const lot = seed(store, '1926', 10, 50, 10);

        store.adjustCount(lot, -5);

        expect(lot.count).toBe(5);
        // 50 / 5 × 1.086 + 10 / 10
        expect(lot.unitCost).toBeCloseTo(11.86, 10);
    });
});

describe('LotStore.applyEdit', () => {
    it('applies valid fields and rejects invalid ones individually', () => {
        const store = makeStore();
        const lot = seed(store, '1926');

        const result = store.applyEdit(lot.id, { type: 'Maduro', price: 'abc', rating: 11, shipping: '$12' });

        expect(result.success).toBe(true);
        if (!result.success || result.data.status !== 'applied') throw new Error('expected applied');
        expect(lot.type).toBe('Maduro');
        expect(lot.price).toBe(50);
        expect(lot.allocatedShipping).toBe(12);
        expect(result.data.rejected.map((r) => [r.field, r.code])).toEqual([
            ['price', INVENTORY_ERROR_CODES.INVALID_NUMERIC_INPUT],
            ['rating', INVENTORY_ERROR_CODES.INVALID_RATING],
        ]);
    });

    it('reports a conflict and changes nothing when the identity collides', () => {
        const store = makeStore();
        const existing = seed(store, '1926');
        const edited = seed(store, '1964');

        const result = store.applyEdit(edited.id, { name: '1926 ', price: 1 });

        expect(result.success).toBe(true);
        if (!result.success || result.data.status !== 'conflict') throw new Error('expected conflict');
        expect(result.data.conflict).toEqual({
            code: INVENTORY_ERROR_CODES.DUPLICATE_LOT_CONFLICT,
            message: 'A lot with the same brand, name and size already exists',
            lotId: edited.id,
            existingLotId: existing.id,
            options: ['combine', 'keep_separate', 'cancel'],
        });
        expect(edited.name).toBe('1964');
        expect(edited.price).toBe(50);
    });

    it('keeps the amortization base on a count edit unless the lot has none', () => {
        const store = makeStore();
        const lot = seed(store, '1926', 10);

        store.applyEdit(lot.id, { count: 4 });
        expect(lot.count).toBe(4);
        expect(lot.originalQuantity).toBe(10);

        lot.originalQuantity = null;
        store.applyEdit(lot.id, { count: 6 });
        expect(lot.originalQuantity).toBe(6);
    });

    it('returns LOT_NOT_FOUND for an unknown id', () => {
        const result = makeStore().applyEdit('nope', { name: 'x' });
        expect(result).toEqual({
            success: false,
            error: { code: INVENTORY_ERROR_CODES.LOT_NOT_FOUND, message: 'Lot not found' },
        });
    });
});

describe('LotStore.resolveDuplicate', () => {
    it('combine merges the edited lot into the existing one and removes it', () => {
        const store = makeStore();
        const existing = seed(store, '1926', 10, 50, 10);
        const edited = seed(store, '1964', 5, 30, 5);

        const result = store.resolveDuplicate(edited.id, { name: '1926' }, 'combine');

        expect(result.success).toBe(true);
        if (!result.success || result.data.resolution !== 'combine') throw new Error('expected combine');
        expect(result.data.lot).toBe(existing);
        expect(result.data.removedLotId).toBe(edited.id);
        expect(existing.count).toBe(15);
        expect(existing.price).toBe(80);
        expect(existing.allocatedShipping).toBe(15);
        expect(existing.originalQuantity).toBe(15);
        expect(store.get(edited.id)).toBeUndefined();
    });

    it('combine applies the numeric part of the patch first', () => {
        const store = makeStore();
        const existing = seed(store, '1926', 10, 50, 10);
        const edited = seed(store, '1964', 5, 30, 5);

        store.resolveDuplicate(edited.id, { name: '1926', count: 2 }, 'combine');

        expect(existing.count).toBe(12);
    });

    it('keep_separate applies the edit under a suffixed name', () => {
        const store = makeStore();
        seed(store, '1926');
        seed(store, '1926 (2)');
        const edited = seed(store, '1964');

        const result = store.resolveDuplicate(edited.id, { name: '1926' }, 'keep_separate');

        expect(result.success).toBe(true);
        expect(edited.name).toBe('1926 (3)');
        expect(store.all()).toHaveLength(3);
    });

    it('cancel leaves the lot as it was', () => {
        const store = makeStore();
        seed(store, '1926');
        const edited = seed(store, '1964');

        const result = store.resolveDuplicate(edited.id, { name: '1926', price: 1 }, 'cancel');

        expect(result).toEqual({ success: true, data: { resolution: 'cancel', lot: edited } });
        expect(edited.name).toBe('1964');
        expect(edited.price).toBe(50);
    });
});

describe('nextDisambiguatedName', () => {
    it('replaces an existing numeric suffix instead of stacking', () => {
        expect(nextDisambiguatedName('Robusto', 2)).toBe('Robusto (2)');
        expect(nextDisambiguatedName('Robusto (2)', 3)).toBe('Robusto (3)');
    });
});

describe('parseRating', () => {
    it('accepts whole numbers from 1 to 10 and clears on blank', () => {
        expect(parseRating('7')).toBe(7);
        expect(parseRating('')).toBeNull();
        expect(parseRating(null)).toBeNull();
        expect(parseRating(0)).toBeUndefined();
        expect(parseRating(8.5)).toBeUndefined();
    });
});
