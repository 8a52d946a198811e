import type { LotIdentity } from './types.js';

export function normalizeIdentityPart(value: string): string {
    return value.trim().toLowerCase();
}

/** Case-insensitive equality on brand, name and size */
export function sameIdentity(a: LotIdentity, b: LotIdentity): boolean {
    return (
        normalizeIdentityPart(a.brand) === normalizeIdentityPart(b.brand) &&
        normalizeIdentityPart(a.name) === normalizeIdentityPart(b.name) &&
        normalizeIdentityPart(a.size) === normalizeIdentityPart(b.size)
    );
}

/**
 * "Robusto" → "Robusto (2)" → "Robusto (3)"; an existing numeric suffix is bumped,
 * not stacked.
 */
export function nextDisambiguatedName(name: string, attempt: number): string {
    const base = name.replace(/\s*\(\d+\)$/, '');
    return `${base} (${attempt})`;
}
