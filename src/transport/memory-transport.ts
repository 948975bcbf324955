import { ConfigError, SerialscopeError } from '../errors.js';
import type { LineTransport } from '../types.js';
import { LineFramer } from './line-framer.js';

/**
 * In-process transport: lines are fed by the caller, outbound lines are collected.
 */
export class MemoryTransport implements LineTransport {
    private readonly framer = new LineFramer();
    private readonly queue: string[];
    readonly written: string[] = [];
    private _closed = false;

    constructor(lines: readonly string[] = []) {
        this.queue = lines.slice();
    }

    /** Queue complete lines. */
    push(...lines: string[]): void {
        this.queue.push(...lines);
    }

    /** Feed raw bytes; only complete lines become readable. */
    pushBytes(chunk: string | Buffer): void {
        this.queue.push(...this.framer.push(chunk));
    }

    isLineAvailable(): boolean {
        return this.queue.length > 0;
    }

    readLine(): string {
        const line = this.queue.shift();
        if (line === undefined) {
            throw new SerialscopeError('readLine() called with no line available');
        }
        return line;
    }

    writeLine(line: string): void {
        if (this._closed) {
            throw new ConfigError('InvalidTransport', 'Transport is closed');
        }
        this.written.push(line);
    }

    close(): void {
        this._closed = true;
    }

    get closed(): boolean {
        return this._closed;
    }

    get queuedLines(): number {
        return this.queue.length;
    }
}
