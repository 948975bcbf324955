/**
 * Plotter session: owns registry, store, selector, stats and pump for one acquisition,
 * plus the optional CSV sink and the redraw timer driving a renderer.
 */

import { saveSessionArchive, type PackOptions } from './archive/session-archive.js';
import { assertInterval, resolveConfig, type SerialscopeConfig } from './config.js';
import { ConfigError, SerialscopeError } from './errors.js';
import { SignalStatsTracker, type SignalStats } from './insight/signal-stats.js';
import { StreamPump, type IngestOutcome, type PumpStats } from './pump/stream-pump.js';
import { SignalRegistry } from './registry/signal-registry.js';
import { RenderSelector } from './selector/render-selector.js';
import { CsvFileSink } from './sink/csv-sink.js';
import { SampleStore } from './store/sample-store.js';
import type { LineHandler, LineTransport, PersistenceSink, Renderer, SerialscopeLogger } from './types.js';

export interface PlotterSessionOptions extends Partial<SerialscopeConfig> {
    /** Replaces the CSV sink built from `csvPath`. */
    sink?: PersistenceSink | null;
    renderer?: Renderer | null;
    logger?: SerialscopeLogger | null;
    onError?: ((error: SerialscopeError, line: string | null) => void) | null;
    env?: NodeJS.ProcessEnv;
}

export class PlotterSession {
    readonly config: SerialscopeConfig;
    readonly registry = new SignalRegistry();
    readonly store: SampleStore;
    readonly selector: RenderSelector;
    readonly signalStats = new SignalStatsTracker();
    readonly pump: StreamPump;

    private readonly sink: PersistenceSink | null;
    private readonly renderer: Renderer | null;
    private readonly logger: SerialscopeLogger | null;
    private readonly onError: ((error: SerialscopeError, line: string | null) => void) | null;
    private transport: LineTransport | null = null;
    private renderTimer: NodeJS.Timeout | null = null;
    private windowSize: number;
    private dirty = false;
    private framesDrawn = 0;

    constructor(options: PlotterSessionOptions = {}) {
        const { sink, renderer, logger, onError, env, ...configOptions } = options;
        this.config = resolveConfig(configOptions, env);
        this.logger = logger ?? null;
        this.onError = onError ?? null;
        this.windowSize = this.config.windowSize;

        this.store = new SampleStore(this.registry);
        this.selector = new RenderSelector(this.registry, this.store, { windowSize: this.config.windowSize });
        this.sink = sink !== undefined
            ? sink
            : (this.config.csvPath ? new CsvFileSink(this.config.csvPath, { logger: this.logger }) : null);
        this.renderer = renderer ?? null;

        this.pump = new StreamPump(this.registry, this.store, {
            windowSize: () => this.windowSize,
            tickIntervalMs: this.config.tickIntervalMs,
            sink: this.sink,
            listeners: [this.selector],
            stats: this.signalStats,
            logger: this.logger,
            onError: this.onError,
        });
    }

    /**
     * Starts ingesting from the transport and, when a renderer is set, the redraw timer.
     */
    start(transport: LineTransport, lineHandler?: LineHandler | null): void {
        this.pump.start(transport, (timeIndex, windowStart) => {
            this.dirty = true;
            lineHandler?.(timeIndex, windowStart);
        });
        this.transport = transport;

        if (this.renderer && !this.renderTimer) {
            const period = assertInterval(this.config.renderIntervalMs, 'render interval');
            this.renderTimer = setInterval(() => {
                if (this.dirty) this.renderFrame();
                // The pump goes idle on its own after a fault; the last frame is drawn above.
                if (this.pump.state !== 'running') this.clearRenderTimer();
            }, period);
        }
    }

    async stop(): Promise<void> {
        this.clearRenderTimer();
        await this.pump.stop();
    }

    private clearRenderTimer(): void {
        if (this.renderTimer) {
            clearInterval(this.renderTimer);
            this.renderTimer = null;
        }
    }

    /** Feeds one line without a transport (replay, tests). */
    ingestLine(line: string): Promise<IngestOutcome> {
        return this.pump.ingestLine(line);
    }

    /**
     * Takes the raw value like an edit field would; it is validated on the next line and render tick,
     * so an invalid entry only skips those until it is corrected.
     */
    setWindowSize(windowSize: number): void {
        this.windowSize = windowSize;
        this.dirty = true;
    }

    getWindowSize(): number {
        return this.windowSize;
    }

    toggle(name: string, included: boolean): boolean {
        const changed = this.selector.toggle(name, included);
        if (changed) this.dirty = true;
        return changed;
    }

    /**
     * Hands the visible window to the renderer. Returns false (previous frame retained)
     * when there is no renderer or the window size is invalid.
     */
    renderFrame(): boolean {
        if (!this.renderer) return false;
        try {
            this.selector.setWindowSize(this.windowSize);
        } catch (e) {
            if (!(e instanceof ConfigError)) throw e;
            this.logger?.warn?.(`${e.name}: ${e.message}; keeping previous frame`);
            this.onError?.(e, null);
            return false;
        }

        const series = this.selector.visibleSeries();
        this.renderer.redraw(series, Array.from(series.keys()), this.selector.viewport());
        this.dirty = false;
        this.framesDrawn++;
        return true;
    }

    /**
     * Sends `name:value` to the device, e.g. to change a setpoint.
     */
    async sendCommand(name: string, value: number): Promise<void> {
        if (!this.transport || this.pump.state !== 'running') {
            throw new SerialscopeError('Cannot send a command: no transport is attached');
        }
        if (!Number.isFinite(value) || name.trim().length === 0 || /[,:]/.test(name)) {
            throw new SerialscopeError(`Invalid command ${name}:${value}`);
        }
        await this.transport.writeLine(`${name.trim()}:${value}`);
    }

    statistics(): SignalStats[] {
        return this.signalStats.list(this.registry.names());
    }

    pumpStats(): PumpStats {
        return this.pump.stats();
    }

    get frames(): number {
        return this.framesDrawn;
    }

    exportArchive(filePath: string, options: PackOptions = {}): Promise<number> {
        return saveSessionArchive(filePath, this.registry, this.store, options);
    }

    /** Stops ingestion and releases the sink and the transport. */
    async close(): Promise<void> {
        const transport = this.transport;
        await this.stop();
        this.transport = null;
        await this.sink?.close?.();
        await transport?.close();
    }
}
