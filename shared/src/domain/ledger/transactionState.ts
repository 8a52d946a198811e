/**
 * Transaction Status State Machine - Pure Domain Logic
 *
 * STATUS FLOW:
 * recorded → partially_reversed → fully_reversed
 *     └──────────────────────────────↗
 *
 * fully_reversed is terminal. Status is derived from the entries that remain
 * (see deriveTransactionStatus) and only ever moves forward.
 */

import type { LedgerEntry, TransactionStatus } from './types.js';

export interface StatusTransition {
    to: TransactionStatus;
    description: string;
}

export const TRANSACTION_STATUS_TRANSITIONS: Record<TransactionStatus, StatusTransition[]> = {
    recorded: [
        { to: 'partially_reversed', description: 'Some units returned or removed' },
        { to: 'fully_reversed', description: 'Every entry reversed in full' },
    ],
    partially_reversed: [
        { to: 'partially_reversed', description: 'Further partial reversal' },
        { to: 'fully_reversed', description: 'Remaining entries reversed' },
    ],
    fully_reversed: [],
};

export const TRANSACTION_STATUSES: readonly TransactionStatus[] = [
    'recorded',
    'partially_reversed',
    'fully_reversed',
] as const;

export function isValidTransactionTransition(from: TransactionStatus, to: TransactionStatus): boolean {
    return TRANSACTION_STATUS_TRANSITIONS[from].some((t) => t.to === to);
}

export function isTerminalStatus(status: TransactionStatus): boolean {
    return TRANSACTION_STATUS_TRANSITIONS[status].length === 0;
}

/**
 * Status implied by the entries still on the ledger.
 * - none left → fully_reversed
 * - fewer entries than created, or any entry below its recorded quantity → partially_reversed
 * - otherwise → recorded
 */
export function deriveTransactionStatus(
    entryCount: number,
    remaining: readonly Pick<LedgerEntry, 'quantity' | 'recordedQuantity'>[],
): TransactionStatus {
    if (remaining.length === 0) return 'fully_reversed';
    if (remaining.length < entryCount) return 'partially_reversed';
    if (remaining.some((e) => e.quantity < e.recordedQuantity)) return 'partially_reversed';
    return 'recorded';
}
