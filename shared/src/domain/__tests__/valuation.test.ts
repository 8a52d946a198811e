/**
 * Unit tests for inventory rollups and the shipping calculator
 */

import { aggregate, averageShipping, averageUnitCost, totalCount, totalValue } from '../valuation/aggregator.js';
import { allocateShippingByUnits, quoteSale, shippingBreakdown } from '../valuation/shipping.js';
import type { Lot } from '../lots/types.js';

function makeLot(overrides: Partial<Lot>): Lot {
    return {
        id: 'lot-1',
        brand: 'Padron',
        name: '1926',
        size: 'Robusto',
        type: '',
        count: 0,
        price: 0,
        allocatedShipping: 0,
        allocatedTax: 0,
        taxRate: 0,
        unitCost: 0,
        originalQuantity: null,
        rating: null,
        history: [],
        ...overrides,
    };
}

describe('aggregator', () => {
    const lots = [
        makeLot({ id: 'a', count: 10, unitCost: 2, allocatedShipping: 8, allocatedTax: 2 }),
        makeLot({ id: 'b', count: 5, unitCost: 4, allocatedShipping: 20, allocatedTax: 0 }),
        makeLot({ id: 'c', count: 0, unitCost: 0, allocatedShipping: 99, allocatedTax: 1 }),
    ];

    it('totals units across all lots', () => {
        expect(totalCount(lots)).toBe(15);
    });

    it('values only lots with stock', () => {
        expect(totalValue(lots)).toBe(40);
    });

    it('averages combined shipping per stocked lot, unweighted', () => {
        // (10 + 20) / 2; the empty lot's 100 is left out
        expect(averageShipping(lots)).toBe(15);
    });

    it('averages unit cost over units', () => {
        expect(averageUnitCost(lots)).toBeCloseTo(40 / 15, 10);
    });

    it('returns zeros for an empty inventory', () => {
        expect(aggregate([])).toEqual({ totalCount: 0, totalValue: 0, averageShipping: 0, averageUnitCost: 0 });
        expect(aggregate([makeLot({ count: 0 })])).toEqual({
            totalCount: 0,
            totalValue: 0,
            averageShipping: 0,
            averageUnitCost: 0,
        });
    });
});

describe('shippingBreakdown', () => {
    it('splits per unit and per 5 / 10 pack', () => {
        expect(shippingBreakdown(30, 20)).toEqual({
            totalShipping: 30,
            totalUnits: 20,
            perUnit: 1.5,
            perUnitFivePack: 6,
            perUnitTenPack: 3,
        });
    });

    it('returns the full amount per unit when there are no units', () => {
        expect(shippingBreakdown(12, 0).perUnit).toBe(12);
    });
});

describe('allocateShippingByUnits', () => {
    it('allocates in proportion to unit counts', () => {
        expect(allocateShippingByUnits(30, [10, 20])).toEqual([10, 20]);
    });

    it('allocates nothing when there are no units', () => {
        expect(allocateShippingByUnits(30, [0, 0])).toEqual([0, 0]);
    });
});

describe('quoteSale', () => {
    it('totals a prospective sale at current unit costs and skips unknown lots', () => {
        const lots = [makeLot({ id: 'a', count: 10, unitCost: 2.5 }), makeLot({ id: 'b', count: 3, unitCost: 4 })];
        const quote = quoteSale(lots, [
            { lotId: 'a', quantity: 2 },
            { lotId: 'missing', quantity: 9 },
            { lotId: 'b', quantity: 1 },
        ]);

        expect(quote.lines).toEqual([
            { lotId: 'a', quantity: 2, unitPrice: 2.5, total: 5 },
            { lotId: 'b', quantity: 1, unitPrice: 4, total: 4 },
        ]);
        expect(quote.totalUnits).toBe(3);
        expect(quote.totalPrice).toBe(9);
    });
});
