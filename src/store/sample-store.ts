/**
 * Sample Store
 * Per-signal append-only series plus the shared time index (one entry per decoded line).
 * The window is a view over this data; nothing is ever evicted.
 */

import { StoreError } from '../errors.js';
import type { SignalRegistry } from '../registry/signal-registry.js';
import type { SeriesView } from '../types.js';

interface SignalSeries {
    timestamps: number[];
    values: number[];
    /** Time-index position of the line each sample arrived with. */
    lines: number[];
}

export interface SeriesSnapshot extends SignalSeries {
    name: string;
}

export interface StoreSnapshot {
    timeIndex: number[];
    signals: SeriesSnapshot[];
}

export class SampleStore {
    private readonly seriesByName = new Map<string, SignalSeries>();
    private readonly times: number[] = [];

    constructor(private readonly registry: SignalRegistry) {}

    static fromSnapshot(registry: SignalRegistry, snapshot: StoreSnapshot): SampleStore {
        const store = new SampleStore(registry);
        for (const t of snapshot.timeIndex) store.times.push(t);
        for (const signal of snapshot.signals) {
            const target = store.resolve(signal.name);
            for (let i = 0; i < signal.values.length; i++) {
                target.timestamps.push(signal.timestamps[i]);
                target.values.push(signal.values[i]);
                target.lines.push(signal.lines[i]);
            }
        }
        return store;
    }

    /**
     * Appends a single sample as its own line: one sample, one time-index entry.
     */
    append(name: string, timestamp: number, value: number): void {
        this.appendLine(timestamp, new Map([[name, value]]));
    }

    /**
     * Appends every sample of one decoded line and a single time-index entry.
     * All names are checked before anything is written, so a failing line leaves no trace.
     */
    appendLine(timestamp: number, samples: ReadonlyMap<string, number>): void {
        const targets: Array<[SignalSeries, number]> = [];
        for (const [name, value] of samples) {
            targets.push([this.resolve(name), value]);
        }

        const line = this.times.length;
        this.times.push(timestamp);
        for (const [target, value] of targets) {
            target.timestamps.push(timestamp);
            target.values.push(value);
            target.lines.push(line);
        }
    }

    /**
     * Smallest time-index position whose timestamp is >= max(0, latest - windowSize),
     * or 0 when there is none. Binary search: a non-monotonic index yields a valid
     * but unspecified position.
     */
    windowStart(windowSize: number): number {
        const n = this.times.length;
        if (n === 0) return 0;

        const startTime = Math.max(0, this.times[n - 1] - windowSize);
        let lo = 0;
        let hi = n;
        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            if (this.times[mid] < startTime) lo = mid + 1;
            else hi = mid;
        }
        return lo === n ? 0 : lo;
    }

    series(name: string): SeriesView {
        const s = this.resolve(name);
        return { timestamps: s.timestamps.slice(), values: s.values.slice() };
    }

    /** Samples of `name` that arrived with line `lineIndex` or later. */
    seriesSince(name: string, lineIndex: number): SeriesView {
        const s = this.resolve(name);
        let lo = 0;
        let hi = s.lines.length;
        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            if (s.lines[mid] < lineIndex) lo = mid + 1;
            else hi = mid;
        }
        return { timestamps: s.timestamps.slice(lo), values: s.values.slice(lo) };
    }

    sampleCount(name: string): number {
        return this.resolve(name).values.length;
    }

    timeIndex(): number[] {
        return this.times.slice();
    }

    timeAt(lineIndex: number): number | undefined {
        return this.times[lineIndex];
    }

    get latestTime(): number | undefined {
        return this.times.length > 0 ? this.times[this.times.length - 1] : undefined;
    }

    get lineCount(): number {
        return this.times.length;
    }

    snapshot(): StoreSnapshot {
        const signals: SeriesSnapshot[] = [];
        for (const name of this.registry.names()) {
            const s = this.seriesByName.get(name);
            signals.push({
                name,
                timestamps: s ? s.timestamps.slice() : [],
                values: s ? s.values.slice() : [],
                lines: s ? s.lines.slice() : [],
            });
        }
        return { timeIndex: this.times.slice(), signals };
    }

    private resolve(name: string): SignalSeries {
        const existing = this.seriesByName.get(name);
        if (existing) return existing;

        if (!this.registry.has(name)) {
            throw new StoreError('NotFound', name);
        }
        const created: SignalSeries = { timestamps: [], values: [], lines: [] };
        this.seriesByName.set(name, created);
        return created;
    }
}
