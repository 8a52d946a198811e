/**
 * Unit tests for the transaction ledger: sales, resupply orders and reversals
 */

import { Ledger } from '../ledger.js';
import { LotStore } from '../../lots/lotStore.js';
import { lotShipping, type Lot } from '../../lots/types.js';
import { INVENTORY_ERROR_CODES } from '../../../errors/index.js';

function setup(): { lots: LotStore; ledger: Ledger } {
    let seq = 0;
    const deps = {
        newId: () => `id-${++seq}`,
        now: () => new Date('2024-05-01T12:00:00.000Z'),
    };
    const lots = new LotStore([], deps);
    const ledger = new Ledger(lots, { entries: [], transactions: [] }, deps);
    return { lots, ledger };
}

/** The reference lot: 10 units, $50, $10 shipping + $4.30 tax at 8.6% → $6.86 per unit */
function stockedPadron(lots: LotStore): Lot {
    return lots.create({
        brand: 'Padron',
        name: '1926',
        size: 'Robusto',
        count: 10,
        price: 50,
        shipping: 10,
        tax: 4.3,
        taxRate: 0.086,
    });
}

function plainLot(lots: LotStore, name: string, count: number): Lot {
    return lots.create({ brand: 'Oliva', name, size: 'Toro', count, price: count * 5, taxRate: 0 });
}

describe('Ledger.recordResupply', () => {
    it('merges into an empty lot and costs it with shipping and tax', () => {
        const { lots, ledger } = setup();
        const lot = lots.create({ brand: 'Padron', name: '1926', size: 'Robusto', count: 0, price: 0, taxRate: 0.086 });

        const result = ledger.recordResupply(
            [{ brand: 'padron', name: '1926', size: 'robusto', count: 10, price: 50 }],
            10,
            8.6,
        );

        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(result.data.mergedLotIds).toEqual([lot.id]);
        expect(result.data.createdLotIds).toEqual([]);
        expect(lot.count).toBe(10);
        expect(lot.allocatedShipping).toBe(10);
        expect(lot.allocatedTax).toBeCloseTo(4.3, 10);
        expect(lotShipping(lot)).toBeCloseTo(14.3, 10);
        expect(lot.originalQuantity).toBe(10);
        expect(lot.unitCost).toBeCloseTo(6.86, 10);

        const [entry] = result.data.entries;
        expect(entry.lotId).toBe(lot.id);
        expect(entry.transactionId).toBe(result.data.orderId);
        expect(entry.unitPrice).toBeCloseTo(6.86, 10);
        expect(entry.totalCost).toBeCloseTo(68.6, 10);
    });

    it('allocates shipping by units and skips invalid lines', () => {
        const { lots, ledger } = setup();

        const result = ledger.recordResupply(
            [
                { brand: 'Oliva', name: 'Serie V', size: 'Toro', count: 10, price: 100 },
                { brand: 'Oliva', name: 'Serie O', size: 'Robusto', count: 0, price: 40 },
                { brand: 'Oliva', name: 'Serie G', size: 'Churchill', count: 20, price: 60 },
            ],
            30,
            10,
        );

        expect(result.success).toBe(true);
        if (!result.success) return;
        const { entries, failures, createdLotIds, orderId } = result.data;

        expect(failures).toEqual([
            {
                index: 1,
                code: INVENTORY_ERROR_CODES.INVALID_QUANTITY,
                message: 'Quantity must be a whole number of at least 1',
                context: { name: 'Serie O' },
            },
        ]);
        expect(createdLotIds).toHaveLength(2);
        expect(entries.map((e) => e.allocatedShipping)).toEqual([10, 20]);
        expect(entries[0].allocatedTax).toBeCloseTo(10, 10);
        expect(entries[1].allocatedTax).toBeCloseTo(6, 10);
        // 100 / 10 × 1.1 + (10 + 10) / 10
        expect(entries[0].unitPrice).toBeCloseTo(13, 10);
        // 60 / 20 × 1.1 + (20 + 6) / 20
        expect(entries[1].unitPrice).toBeCloseTo(4.6, 10);
        expect(lots.all().map((l) => l.originalQuantity)).toEqual([10, 20]);

        expect(ledger.transaction(orderId ?? '')).toEqual({
            id: orderId,
            kind: 'resupply',
            timestamp: '2024-05-01T12:00:00.000Z',
            status: 'recorded',
            entryCount: 2,
            totalShipping: 30,
            taxRatePercent: 10,
        });
    });

    it('rejects the whole order when shipping or tax is invalid', () => {
        const { lots, ledger } = setup();
        const items = [{ brand: 'Oliva', name: 'Serie V', size: 'Toro', count: 1, price: 1 }];

        expect(ledger.recordResupply(items, -5, 8.6)).toEqual({
            success: false,
            error: { code: INVENTORY_ERROR_CODES.INVALID_NUMERIC_INPUT, message: 'Please enter a valid number' },
        });
        expect(ledger.recordResupply(items, 5, Number.NaN).success).toBe(false);
        expect(lots.all()).toHaveLength(0);
        expect(ledger.transactions()).toHaveLength(0);
    });

    it('registers nothing when every line is invalid', () => {
        const { ledger } = setup();
        const result = ledger.recordResupply([{ brand: 'Oliva', name: 'V', size: 'Toro', count: 2, price: -1 }], 0, 0);

        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(result.data.orderId).toBeNull();
        expect(result.data.failures[0].code).toBe(INVENTORY_ERROR_CODES.INVALID_NUMERIC_INPUT);
        expect(ledger.transactions()).toHaveLength(0);
    });
});

describe('Ledger.recordSale', () => {
    it('captures the unit cost at sale time', () => {
        const { lots, ledger } = setup();
        const lot = stockedPadron(lots);

        const sale = ledger.recordSale([{ lotId: lot.id, quantity: 3 }]);

        expect(sale.failures).toEqual([]);
        expect(sale.entries).toHaveLength(1);
        expect(sale.entries[0].unitPrice).toBeCloseTo(6.86, 10);
        expect(sale.entries[0].totalCost).toBeCloseTo(20.58, 10);
        expect(sale.entries[0].recordedQuantity).toBe(3);
        expect(lot.count).toBe(7);
        // 50 / 7 × 1.086 + 14.30 / 10
        expect(lot.unitCost).toBeCloseTo((50 / 7) * 1.086 + 1.43, 10);
    });

    it('skips lines that cannot be sold and keeps the rest under one transaction', () => {
        const { lots, ledger } = setup();
        const a = plainLot(lots, 'A', 5);
        const b = plainLot(lots, 'B', 2);

        const sale = ledger.recordSale([
            { lotId: a.id, quantity: 2 },
            { lotId: b.id, quantity: 3 },
            { lotId: 'missing', quantity: 1 },
            { lotId: a.id, quantity: 0 },
            { lotId: b.id, quantity: 2 },
        ]);

        expect(sale.entries.map((e) => [e.lotId, e.quantity])).toEqual([
            [a.id, 2],
            [b.id, 2],
        ]);
        expect(sale.entries.every((e) => e.transactionId === sale.transactionId)).toBe(true);
        expect(sale.failures.map((f) => [f.index, f.code])).toEqual([
            [1, INVENTORY_ERROR_CODES.INSUFFICIENT_STOCK],
            [2, INVENTORY_ERROR_CODES.LOT_NOT_FOUND],
            [3, INVENTORY_ERROR_CODES.INVALID_QUANTITY],
        ]);
        expect(sale.failures[0].message).toBe('Not enough stock for B. Only 2 available.');
        expect(a.count).toBe(3);
        expect(b.count).toBe(0);
    });

    it('registers no transaction when nothing sells', () => {
        const { lots, ledger } = setup();
        const a = plainLot(lots, 'A', 1);

        const sale = ledger.recordSale([{ lotId: a.id, quantity: 2 }]);

        expect(sale.transactionId).toBeNull();
        expect(ledger.transactions()).toHaveLength(0);
        expect(ledger.entries()).toHaveLength(0);
    });

    it('lists sales newest first', () => {
        const { lots, ledger } = setup();
        const a = plainLot(lots, 'A', 5);
        const first = ledger.recordSale([{ lotId: a.id, quantity: 1 }]);
        const second = ledger.recordSale([{ lotId: a.id, quantity: 2 }]);

        expect(ledger.salesHistory().map((e) => e.transactionId)).toEqual([second.transactionId, first.transactionId]);
    });
});

describe('Ledger.reverseEntry', () => {
    it('returns a full sale to stock and removes the entry', () => {
        const { lots, ledger } = setup();
        const lot = stockedPadron(lots);
        const sale = ledger.recordSale([{ lotId: lot.id, quantity: 3 }]);
        const entryId = sale.entries[0].id;

        const result = ledger.reverseEntry(entryId, 3);

        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(result.data.removed).toBe(true);
        expect(result.data.status).toBe('fully_reversed');
        expect(lot.count).toBe(10);
        expect(lot.unitCost).toBeCloseTo(6.86, 10);
        expect(ledger.entry(entryId)).toBeUndefined();

        // A second reversal is rejected, not applied twice
        expect(ledger.reverseEntry(entryId, 3)).toEqual({
            success: false,
            error: {
                code: INVENTORY_ERROR_CODES.REVERSAL_NOT_FOUND,
                message: 'This entry has already been reversed or does not exist',
            },
        });
        expect(lot.count).toBe(10);
    });

    it('partially reverses a sale', () => {
        const { lots, ledger } = setup();
        const lot = stockedPadron(lots);
        const sale = ledger.recordSale([{ lotId: lot.id, quantity: 5 }]);
        const entry = sale.entries[0];

        const result = ledger.reverseEntry(entry.id, 2);

        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(result.data.removed).toBe(false);
        expect(result.data.status).toBe('partially_reversed');
        expect(lot.count).toBe(7);
        expect(entry.quantity).toBe(3);
        expect(entry.recordedQuantity).toBe(5);
        expect(entry.totalCost).toBeCloseTo(entry.unitPrice * 3, 10);
        expect(ledger.transaction(entry.transactionId)?.status).toBe('partially_reversed');
    });

    it('validates the reversal quantity', () => {
        const { lots, ledger } = setup();
        const lot = plainLot(lots, 'A', 5);
        const entryId = ledger.recordSale([{ lotId: lot.id, quantity: 2 }]).entries[0].id;

        for (const quantity of [0, 3, 1.5]) {
            const result = ledger.reverseEntry(entryId, quantity);
            expect(result).toEqual({
                success: false,
                error: { code: INVENTORY_ERROR_CODES.INVALID_QUANTITY, message: 'Reversal quantity must be between 1 and 2' },
            });
        }
        expect(lot.count).toBe(3);
    });

    it('scales a partially reversed resupply line and changes only the lot count', () => {
        const { lots, ledger } = setup();
        const order = ledger.recordResupply([{ brand: 'Oliva', name: 'V', size: 'Toro', count: 10, price: 50 }], 10, 0);
        if (!order.success) throw new Error('order failed');
        const entry = order.data.entries[0];
        const lot = lots.all()[0];
        expect(entry.totalCost).toBe(60);

        const result = ledger.reverseEntry(entry.id, 4);

        expect(result.success).toBe(true);
        expect(entry.quantity).toBe(6);
        expect(entry.price).toBeCloseTo(30, 10);
        expect(entry.allocatedShipping).toBeCloseTo(6, 10);
        expect(entry.totalCost).toBeCloseTo(36, 10);
        expect(lot.count).toBe(6);
        expect(lot.price).toBe(50);
        expect(lot.originalQuantity).toBe(10);
    });

    it('refuses to remove resupplied units that were already sold', () => {
        const { lots, ledger } = setup();
        const order = ledger.recordResupply([{ brand: 'Oliva', name: 'Serie V', size: 'Toro', count: 10, price: 50 }], 0, 0);
        if (!order.success) throw new Error('order failed');
        const lot = lots.all()[0];
        ledger.recordSale([{ lotId: lot.id, quantity: 8 }]);

        expect(ledger.reverseEntry(order.data.entries[0].id, 10)).toEqual({
            success: false,
            error: {
                code: INVENTORY_ERROR_CODES.INSUFFICIENT_STOCK,
                message: 'Cannot remove 10 of Serie V. Only 2 in stock.',
            },
        });
        expect(lot.count).toBe(2);
    });

    it('reports LOT_NOT_FOUND for an entry whose lot was removed', () => {
        const { lots, ledger } = setup();
        const lot = plainLot(lots, 'A', 5);
        const entryId = ledger.recordSale([{ lotId: lot.id, quantity: 1 }]).entries[0].id;
        lots.remove(lot.id);

        const result = ledger.reverseEntry(entryId, 1);

        expect(result.success).toBe(false);
        if (!result.success) expect(result.error.code).toBe(INVENTORY_ERROR_CODES.LOT_NOT_FOUND);
    });
});

describe('Ledger.reverseTransaction', () => {
    it('reverses every entry of a sale', () => {
        const { lots, ledger } = setup();
        const a = plainLot(lots, 'A', 5);
        const b = plainLot(lots, 'B', 5);
        const sale = ledger.recordSale([
            { lotId: a.id, quantity: 2 },
            { lotId: b.id, quantity: 4 },
        ]);
        const transactionId = sale.transactionId ?? '';

        const result = ledger.reverseTransaction(transactionId);

        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(result.data.reversed).toHaveLength(2);
        expect(result.data.failures).toEqual([]);
        expect(result.data.status).toBe('fully_reversed');
        expect([a.count, b.count]).toEqual([5, 5]);
        expect(ledger.reverseTransaction(transactionId).success).toBe(false);
    });

    it('reports entries that cannot be reversed and reverses the rest', () => {
        const { lots, ledger } = setup();
        const order = ledger.recordResupply(
            [
                { brand: 'Oliva', name: 'A', size: 'Toro', count: 10, price: 10 },
                { brand: 'Oliva', name: 'B', size: 'Toro', count: 5, price: 10 },
            ],
            0,
            0,
        );
        if (!order.success || !order.data.orderId) throw new Error('order failed');
        const [a, b] = lots.all();
        ledger.recordSale([{ lotId: a.id, quantity: 10 }]);

        const result = ledger.reverseTransaction(order.data.orderId);

        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(result.data.reversed.map((r) => r.lotId)).toEqual([b.id]);
        expect(result.data.failures).toEqual([
            {
                index: 0,
                code: INVENTORY_ERROR_CODES.INSUFFICIENT_STOCK,
                message: 'Cannot remove 10 of A. Only 0 in stock.',
                context: { entryId: order.data.entries[0].id, lotId: a.id },
            },
        ]);
        expect(result.data.status).toBe('partially_reversed');
        expect(b.count).toBe(0);
    });

    it('rejects an unknown transaction', () => {
        const { ledger } = setup();
        const result = ledger.reverseTransaction('nope');
        expect(result.success).toBe(false);
        if (!result.success) expect(result.error.code).toBe(INVENTORY_ERROR_CODES.REVERSAL_NOT_FOUND);
    });
});

describe('Ledger.relinkLot', () => {
    it('re-points entries of a combined lot', () => {
        const { lots, ledger } = setup();
        const a = plainLot(lots, 'A', 5);
        const b = plainLot(lots, 'B', 5);
        ledger.recordSale([{ lotId: a.id, quantity: 1 }]);
        ledger.recordSale([{ lotId: a.id, quantity: 1 }]);

        expect(ledger.relinkLot(a.id, b.id)).toBe(2);
        expect(ledger.entries().every((e) => e.lotId === b.id)).toBe(true);
    });
});
