/**
 * Signal Registry
 * Ordered set of known signal names. Indices are assigned once and never change.
 * Single writer: only the stream pump registers names.
 */

export interface Registration {
    index: number;
    isNew: boolean;
}

interface SignalEntry {
    index: number;
    included: boolean;
}

export class SignalRegistry {
    private readonly entries = new Map<string, SignalEntry>();
    private readonly order: string[] = [];

    registerIfNew(name: string): Registration {
        const existing = this.entries.get(name);
        if (existing) {
            return { index: existing.index, isNew: false };
        }

        const index = this.order.length;
        this.entries.set(name, { index, included: true });
        this.order.push(name);
        return { index, isNew: true };
    }

    /** Snapshot of registered names in registration order. */
    names(): string[] {
        return this.order.slice();
    }

    has(name: string): boolean {
        return this.entries.has(name);
    }

    indexOf(name: string): number {
        return this.entries.get(name)?.index ?? -1;
    }

    /** Unknown names are never included. */
    isIncluded(name: string): boolean {
        return this.entries.get(name)?.included ?? false;
    }

    /**
     * Returns false (and changes nothing) when the name was never registered.
     */
    setIncluded(name: string, included: boolean): boolean {
        const entry = this.entries.get(name);
        if (!entry) return false;
        entry.included = included;
        return true;
    }

    get size(): number {
        return this.order.length;
    }
}
