/**
 * Search and sort over lots — the inventory list's search box and column headers.
 */

import { lotShipping, type Lot } from './types.js';

export type LotSortColumn =
    | 'brand'
    | 'name'
    | 'size'
    | 'type'
    | 'count'
    | 'price'
    | 'shipping'
    | 'unitCost'
    | 'rating';

export const LOT_SORT_COLUMNS: readonly LotSortColumn[] = [
    'brand',
    'name',
    'size',
    'type',
    'count',
    'price',
    'shipping',
    'unitCost',
    'rating',
];

export type SortDirection = 'asc' | 'desc';

export function isLotSortColumn(value: string): value is LotSortColumn {
    return (LOT_SORT_COLUMNS as readonly string[]).includes(value);
}

/** Case-insensitive substring match on name or brand; blank term matches everything */
export function filterLots(lots: readonly Lot[], term: string): Lot[] {
    const q = term.trim().toLowerCase();
    if (!q) return [...lots];
    return lots.filter((lot) => lot.name.toLowerCase().includes(q) || lot.brand.toLowerCase().includes(q));
}

function sortValue(lot: Lot, column: LotSortColumn): string | number {
    switch (column) {
        case 'count':
            return lot.count;
        case 'price':
            return lot.price;
        case 'shipping':
            return lotShipping(lot);
        case 'unitCost':
            return lot.unitCost;
        case 'rating':
            return lot.rating ?? -1;
        default:
            return lot[column].toLowerCase();
    }
}

function compare(a: string | number, b: string | number): number {
    if (typeof a === 'number' && typeof b === 'number') return a - b;
    return String(a).localeCompare(String(b));
}

/**
 * Without a column: brand, then name (case-insensitive).
 * Sorting is stable, so ties keep their previous order.
 */
export function sortLots(lots: readonly Lot[], column?: LotSortColumn, direction: SortDirection = 'asc'): Lot[] {
    const sorted = [...lots];
    if (!column) {
        return sorted.sort(
            (a, b) =>
                compare(a.brand.toLowerCase(), b.brand.toLowerCase()) ||
                compare(a.name.toLowerCase(), b.name.toLowerCase()),
        );
    }
    const sign = direction === 'desc' ? -1 : 1;
    return sorted.sort((a, b) => sign * compare(sortValue(a, column), sortValue(b, column)));
}
