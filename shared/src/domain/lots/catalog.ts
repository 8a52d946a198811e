/**
 * Catalog — known brands, sizes and types offered as pick lists.
 * Grown from the lots themselves plus anything added explicitly.
 */

import type { Lot } from './types.js';

export type CatalogKind = 'brands' | 'sizes' | 'types';

export const CATALOG_KINDS: readonly CatalogKind[] = ['brands', 'sizes', 'types'];

export interface Catalog {
    brands: string[];
    sizes: string[];
    types: string[];
}

export function emptyCatalog(): Catalog {
    return { brands: [], sizes: [], types: [] };
}

/** Trimmed, de-duplicated case-insensitively (first spelling wins), sorted */
function normalizeValues(values: Iterable<string>): string[] {
    const seen = new Map<string, string>();
    for (const raw of values) {
        const value = raw.trim();
        if (!value) continue;
        const key = value.toLowerCase();
        if (!seen.has(key)) seen.set(key, value);
    }
    return [...seen.values()].sort((a, b) => a.localeCompare(b, undefined, { sensitivity: 'base' }));
}

export function buildCatalog(lots: readonly Lot[], extra: Catalog = emptyCatalog()): Catalog {
    return {
        brands: normalizeValues([...extra.brands, ...lots.map((l) => l.brand)]),
        sizes: normalizeValues([...extra.sizes, ...lots.map((l) => l.size)]),
        types: normalizeValues([...extra.types, ...lots.map((l) => l.type)]),
    };
}

export function addCatalogValue(catalog: Catalog, kind: CatalogKind, value: string): Catalog {
    const next: Catalog = { ...catalog };
    next[kind] = normalizeValues([...catalog[kind], value]);
    return next;
}

export function isCatalogKind(value: string): value is CatalogKind {
    return (CATALOG_KINDS as readonly string[]).includes(value);
}
