/**
 * Stream Pump
 *
 * Cooperative polling loop: every tick checks the transport and ingests at most one line
 * (decode -> register -> notify -> append -> window -> redraw hook -> persist).
 * States: idle <-> running. Stopping returns to idle; the pump can be started again.
 */

import { decodeLine, TIME_KEY, type MalformedField } from '../decoder/line-decoder.js';
import { ConfigError, DecodeError, PumpStateError, SerialscopeError } from '../errors.js';
import type { SignalStatsTracker } from '../insight/signal-stats.js';
import type { SignalRegistry } from '../registry/signal-registry.js';
import type { SampleStore } from '../store/sample-store.js';
import type { LineHandler, LineTransport, PersistenceSink, SchemaListener, SerialscopeLogger } from '../types.js';
import { assertInterval, DEFAULT_CONFIG } from '../config.js';

export type PumpState = 'idle' | 'running';

export type WindowSizeSource = number | (() => number);

export interface StreamPumpOptions {
    /** Re-read on every line when given as a getter. */
    windowSize?: WindowSizeSource;
    tickIntervalMs?: number;
    sink?: PersistenceSink | null;
    listeners?: SchemaListener[];
    stats?: SignalStatsTracker | null;
    lineHandler?: LineHandler | null;
    logger?: SerialscopeLogger | null;
    /** Called for every reported problem: dropped lines, invalid window sizes, and the fault that stopped the loop. */
    onError?: ((error: SerialscopeError, line: string | null) => void) | null;
}

export type IngestOutcome =
    | {
        status: 'accepted';
        timestamp: number;
        newSignals: string[];
        /** null when the window size was invalid for this line. */
        windowStart: number | null;
        skipped: MalformedField[];
    }
    | { status: 'dropped'; error: DecodeError };

export interface PumpStats {
    state: PumpState;
    linesRead: number;
    linesAccepted: number;
    droppedLines: number;
    timestampRegressions: number;
    lastError: SerialscopeError | null;
}

export class StreamPump {
    private _state: PumpState = 'idle';
    private transport: LineTransport | null = null;
    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<void> | null = null;
    /** Registry size the sink last acknowledged; -1 until the first header went out. */
    private announcedSchemaSize = -1;
    /** Bumped on every start so a tick from an earlier run never reschedules itself. */
    private generation = 0;

    private windowSize: WindowSizeSource;
    private readonly tickIntervalMs: number;
    private readonly sink: PersistenceSink | null;
    private readonly listeners: SchemaListener[];
    private readonly signalStats: SignalStatsTracker | null;
    private lineHandler: LineHandler | null;
    private readonly logger: SerialscopeLogger | null;
    private readonly onError: ((error: SerialscopeError, line: string | null) => void) | null;

    private linesRead = 0;
    private linesAccepted = 0;
    private droppedLines = 0;
    private timestampRegressions = 0;
    private lastError: SerialscopeError | null = null;

    constructor(
        private readonly registry: SignalRegistry,
        private readonly store: SampleStore,
        options: StreamPumpOptions = {}
    ) {
        this.windowSize = options.windowSize ?? DEFAULT_CONFIG.windowSize;
        this.tickIntervalMs = assertInterval(options.tickIntervalMs ?? DEFAULT_CONFIG.tickIntervalMs, 'tick interval');
        this.sink = options.sink ?? null;
        this.listeners = options.listeners ? options.listeners.slice() : [];
        this.signalStats = options.stats ?? null;
        this.lineHandler = options.lineHandler ?? null;
        this.logger = options.logger ?? null;
        this.onError = options.onError ?? null;
    }

    get state(): PumpState {
        return this._state;
    }

    setWindowSize(windowSize: WindowSizeSource): void {
        this.windowSize = windowSize;
    }

    addListener(listener: SchemaListener): void {
        this.listeners.push(listener);
    }

    start(transport: LineTransport, lineHandler?: LineHandler | null): void {
        if (this._state === 'running') {
            throw new PumpStateError('Stream pump is already running');
        }
        this.transport = transport;
        if (lineHandler !== undefined) this.lineHandler = lineHandler;
        this._state = 'running';
        this.generation++;
        this.logger?.info?.(`Pump started (tick ${this.tickIntervalMs} ms)`);
        this.scheduleTick(this.generation);
    }

    /**
     * No tick starts after this is called; resolves once a tick already in progress has finished.
     */
    async stop(): Promise<void> {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        const wasRunning = this._state === 'running';
        this._state = 'idle';
        if (this.inFlight) {
            await this.inFlight;
        }
        if (this._state === 'idle') this.transport = null;
        if (wasRunning) {
            this.logger?.info?.(`Pump stopped after ${this.linesRead} lines (${this.droppedLines} dropped)`);
        }
    }

    stats(): PumpStats {
        return {
            state: this._state,
            linesRead: this.linesRead,
            linesAccepted: this.linesAccepted,
            droppedLines: this.droppedLines,
            timestampRegressions: this.timestampRegressions,
            lastError: this.lastError,
        };
    }

    /**
     * Runs one raw line through the pipeline. Decode failures are reported and returned,
     * never thrown; store and sink failures are thrown.
     */
    async ingestLine(line: string): Promise<IngestOutcome> {
        const decoded = decodeLine(line);
        if (!decoded.ok) {
            this.droppedLines++;
            this.report(decoded.error, line, 'warn');
            return { status: 'dropped', error: decoded.error };
        }

        const { timestamp, samples, skipped } = decoded.value;

        const newSignals: string[] = [];
        for (const name of samples.keys()) {
            const { index, isNew } = this.registry.registerIfNew(name);
            if (!isNew) continue;
            newSignals.push(name);
            for (const listener of this.listeners) {
                listener.onSignalRegistered(name, index);
            }
        }

        const headers = [TIME_KEY, ...this.registry.names()];
        if (this.sink && this.registry.size !== this.announcedSchemaSize) {
            await this.sink.onSchemaChanged(headers);
            this.announcedSchemaSize = this.registry.size;
        }
        if (newSignals.length > 0) {
            this.logger?.info?.(`New signal(s): ${newSignals.join(', ')}`);
        }

        const latest = this.store.latestTime;
        if (latest !== undefined && timestamp < latest) {
            this.timestampRegressions++;
            this.logger?.warn?.(`Timestamp went backwards (${latest} -> ${timestamp}); window accuracy is degraded`);
        }

        this.store.appendLine(timestamp, samples);
        this.linesAccepted++;
        if (this.signalStats) {
            for (const [name, value] of samples) {
                this.signalStats.onSample(name, timestamp, value);
            }
        }

        const windowStart = this.computeWindowStart(line);
        if (windowStart !== null && this.lineHandler) {
            this.lineHandler(this.store.timeIndex(), windowStart);
        }

        if (this.sink) {
            const values = [timestamp];
            for (let i = 1; i < headers.length; i++) {
                values.push(samples.get(headers[i]) ?? NaN);
            }
            await this.sink.onLine(values);
        }

        return { status: 'accepted', timestamp, newSignals, windowStart, skipped };
    }

    private computeWindowStart(line: string): number | null {
        const size = typeof this.windowSize === 'function' ? this.windowSize() : this.windowSize;
        if (Number.isNaN(size) || size <= 0) {
            this.report(new ConfigError('InvalidWindowSize', `Invalid window size: ${size} (must be > 0)`), line, 'warn');
            return null;
        }
        return this.store.windowStart(size);
    }

    /**
     * A tick waits for one still in flight from an earlier run, so at most one line is ingested at a time.
     */
    private scheduleTick(generation: number): void {
        this.timer = setTimeout(() => {
            this.timer = null;
            const previous = this.inFlight;
            const current: Promise<void> = (previous ? previous.then(() => this.tick(generation)) : this.tick(generation))
                .catch((e: unknown) => this.onCallbackFailure(e, generation))
                .finally(() => {
                    if (this.inFlight === current) this.inFlight = null;
                    if (this._state === 'running' && generation === this.generation) this.scheduleTick(generation);
                });
            this.inFlight = current;
        }, this.tickIntervalMs);
    }

    private async tick(generation: number): Promise<void> {
        const transport = this.transport;
        if (!transport || this._state !== 'running' || generation !== this.generation) return;

        let line: string | null = null;
        try {
            if (!transport.isLineAvailable()) return;
            line = transport.readLine();
            this.linesRead++;
            await this.ingestLine(line);
        } catch (e) {
            const error = e instanceof SerialscopeError ? e : new SerialscopeError(`Pump tick failed: ${String(e)}`, e);
            if (generation === this.generation) {
                this._state = 'idle';
                this.transport = null;
            }
            this.report(error, line, 'error');
        }
    }

    /** A logger or onError callback threw while a fault was being reported. */
    private onCallbackFailure(e: unknown, generation: number): void {
        this.lastError = new SerialscopeError(`Error callback failed: ${String(e)}`, e);
        if (generation === this.generation) {
            this._state = 'idle';
            this.transport = null;
        }
    }

    private report(error: SerialscopeError, line: string | null, level: 'warn' | 'error'): void {
        this.lastError = error;
        const message = `${error.name}: ${error.message}`;
        if (level === 'warn') this.logger?.warn?.(message);
        else this.logger?.error?.(message);
        this.onError?.(error, line);
    }
}
