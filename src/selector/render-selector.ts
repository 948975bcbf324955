/**
 * Render Selector
 * Owns the inclusion toggles and produces the windowed view handed to a plotting surface.
 */

import { assertWindowSize, DEFAULT_CONFIG } from '../config.js';
import type { SignalRegistry } from '../registry/signal-registry.js';
import type { SampleStore } from '../store/sample-store.js';
import type { SchemaListener, SeriesView, Viewport } from '../types.js';

/** Default line colours, cycled by registration index. */
export const DEFAULT_PALETTE: readonly string[] = [
    '#0072BD', '#D95319', '#EDB120', '#7E2F8E', '#77AC30', '#4DBEEE', '#A2142F',
];

export type SignalAddedListener = (name: string, index: number) => void;

export interface RenderSelectorOptions {
    windowSize?: number;
    palette?: readonly string[];
}

export class RenderSelector implements SchemaListener {
    private windowSize: number;
    private readonly palette: readonly string[];
    private readonly listeners = new Set<SignalAddedListener>();

    constructor(
        private readonly registry: SignalRegistry,
        private readonly store: SampleStore,
        options: RenderSelectorOptions = {}
    ) {
        this.windowSize = assertWindowSize(options.windowSize ?? DEFAULT_CONFIG.windowSize);
        this.palette = options.palette && options.palette.length > 0 ? options.palette : DEFAULT_PALETTE;
    }

    onSignalRegistered(name: string, index: number): void {
        this.registry.setIncluded(name, true);
        for (const listener of this.listeners) {
            listener(name, index);
        }
    }

    /** Subscribe to newly registered signals (e.g. to add a checkbox). Returns the unsubscribe function. */
    onSignalAdded(listener: SignalAddedListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    toggle(name: string, included: boolean): boolean {
        return this.registry.setIncluded(name, included);
    }

    isIncluded(name: string): boolean {
        return this.registry.isIncluded(name);
    }

    setWindowSize(windowSize: number): void {
        this.windowSize = assertWindowSize(windowSize);
    }

    getWindowSize(): number {
        return this.windowSize;
    }

    /** Included signals in registration order. */
    visibleNames(): string[] {
        return this.registry.names().filter((name) => this.registry.isIncluded(name));
    }

    visibleSeries(windowSize: number = this.windowSize): Map<string, SeriesView> {
        const start = this.store.windowStart(assertWindowSize(windowSize));
        const out = new Map<string, SeriesView>();
        for (const name of this.visibleNames()) {
            out.set(name, this.store.seriesSince(name, start));
        }
        return out;
    }

    /**
     * X-axis limits: from the first timestamp in the window to the latest one,
     * but never narrower than the window size itself at the start of a session.
     */
    viewport(windowSize: number = this.windowSize): Viewport | null {
        const latest = this.store.latestTime;
        if (latest === undefined) return null;

        const size = assertWindowSize(windowSize);
        const start = this.store.timeAt(this.store.windowStart(size)) ?? latest;
        return { start, end: Math.max(latest, size) };
    }

    colorFor(name: string): string | null {
        const index = this.registry.indexOf(name);
        if (index < 0) return null;
        return this.palette[index % this.palette.length];
    }
}
