export type SerialscopeLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

/** Index-aligned samples of one signal, in arrival order. */
export interface SeriesView {
    timestamps: number[];
    values: number[];
}

/** X-axis limits of the current window. */
export interface Viewport {
    start: number;
    end: number;
}

/**
 * Line-oriented transport. The core only relies on "lines of text arrive".
 */
export interface LineTransport {
    isLineAvailable(): boolean;
    /** Next complete line without its terminator. Only valid after `isLineAvailable()` returned true. */
    readLine(): string;
    writeLine(line: string): Promise<void> | void;
    close(): Promise<void> | void;
}

/**
 * Receives the full per-line sample set. Calls are awaited on the producer tick.
 */
export interface PersistenceSink {
    /** Ordered headers, `Time` first, then signals in registration order. */
    onSchemaChanged(headers: readonly string[]): Promise<void> | void;
    /** One value per header, in header order. */
    onLine(values: readonly number[]): Promise<void> | void;
    close?(): Promise<void> | void;
}

export interface Renderer {
    redraw(series: ReadonlyMap<string, SeriesView>, order: readonly string[], viewport: Viewport | null): void;
}

/** Notified by the pump when a signal name is seen for the first time. */
export interface SchemaListener {
    onSignalRegistered(name: string, index: number): void;
}

export type LineHandler = (timeIndex: readonly number[], windowStart: number) => void;
