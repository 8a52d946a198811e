/**
 * Persistence Port
 *
 * The engine writes its last computed state through this interface after
 * every mutation. Implementations are synchronous; the engine has no
 * suspension points between a change and its save.
 */

import type { Snapshot } from '../schemas/records.js';

export interface InventoryRepository {
    /** Raw stored data (validated by the engine); null when nothing is stored yet */
    load(): unknown;
    /** Throws when the state could not be written */
    save(snapshot: Snapshot): void;
}

/**
 * Keeps a deep copy of the last saved snapshot. Used by tests and by callers
 * that only need the engine in memory.
 */
export class InMemoryInventoryRepository implements InventoryRepository {
    private stored: Snapshot | null;
    saveCount = 0;

    constructor(initial: Snapshot | null = null) {
        this.stored = initial ? structuredClone(initial) : null;
    }

    load(): unknown {
        return this.stored ? structuredClone(this.stored) : null;
    }

    save(snapshot: Snapshot): void {
        this.stored = structuredClone(snapshot);
        this.saveCount += 1;
    }

    /** Last saved snapshot, for assertions */
    last(): Snapshot | null {
        return this.stored;
    }
}
