import type { PersistenceSink } from '../types.js';

/** Keeps every header change and row in memory. */
export class MemorySink implements PersistenceSink {
    readonly headerHistory: string[][] = [];
    readonly rows: number[][] = [];
    closed = false;

    onSchemaChanged(headers: readonly string[]): void {
        this.headerHistory.push(headers.slice());
    }

    onLine(values: readonly number[]): void {
        this.rows.push(values.slice());
    }

    close(): void {
        this.closed = true;
    }

    get headers(): string[] {
        return this.headerHistory.length > 0 ? this.headerHistory[this.headerHistory.length - 1].slice() : [];
    }
}
