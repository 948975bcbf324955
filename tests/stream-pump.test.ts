import { SignalRegistry } from '../src/registry/signal-registry.js';
import { SampleStore } from '../src/store/sample-store.js';
import { StreamPump, type StreamPumpOptions } from '../src/pump/stream-pump.js';
import { MemoryTransport } from '../src/transport/memory-transport.js';
import { MemorySink } from '../src/sink/memory-sink.js';
import { SignalStatsTracker } from '../src/insight/signal-stats.js';
import { ConfigError, DecodeError, PumpStateError, SerialscopeError } from '../src/errors.js';

function setup(options: StreamPumpOptions = {}) {
    const registry = new SignalRegistry();
    const store = new SampleStore(registry);
    const sink = new MemorySink();
    const pump = new StreamPump(registry, store, { sink, tickIntervalMs: 10, ...options });
    return { registry, store, sink, pump };
}

describe('StreamPump ingest', () => {
    it('builds series and headers in order of first appearance', async () => {
        const { store, sink, pump, registry } = setup();

        await pump.ingestLine('Time:0,A:1');
        await pump.ingestLine('Time:1,A:2,B:5');
        await pump.ingestLine('Time:2,B:6');

        expect(registry.names()).toEqual(['A', 'B']);
        expect(store.series('A')).toEqual({ timestamps: [0, 1], values: [1, 2] });
        expect(store.series('B')).toEqual({ timestamps: [1, 2], values: [5, 6] });
        expect(sink.headerHistory).toEqual([['Time', 'A'], ['Time', 'A', 'B']]);
        expect(sink.rows).toEqual([[0, 1], [1, 2, 5], [2, NaN, 6]]);
    });

    it('announces the Time-only header before the first row', async () => {
        const { sink, pump } = setup();
        await pump.ingestLine('Time:0');
        await pump.ingestLine('Time:1');

        expect(sink.headerHistory).toEqual([['Time']]);
        expect(sink.rows).toEqual([[0], [1]]);
    });

    it('notifies schema listeners before any sample of the new signal is stored', async () => {
        const registry = new SignalRegistry();
        const store = new SampleStore(registry);
        const seen: Array<{ name: string; index: number; stored: number }> = [];
        const pump = new StreamPump(registry, store, {
            listeners: [{ onSignalRegistered: (name, index) => seen.push({ name, index, stored: store.sampleCount(name) }) }],
        });

        await pump.ingestLine('Time:0,A:1,B:2');
        await pump.ingestLine('Time:1,A:3');

        expect(seen).toEqual([
            { name: 'A', index: 0, stored: 0 },
            { name: 'B', index: 1, stored: 0 },
        ]);
    });

    it('announces a header again after the sink failed to take it', async () => {
        const sink = new MemorySink();
        let failNext = true;
        const { pump, registry } = setup({
            sink: {
                onSchemaChanged: (headers) => {
                    if (failNext && headers.includes('B')) {
                        failNext = false;
                        throw new Error('disk full');
                    }
                    sink.onSchemaChanged(headers);
                },
                onLine: (values) => sink.onLine(values),
            },
        });

        await pump.ingestLine('Time:0,A:1');
        await expect(pump.ingestLine('Time:1,A:2,B:5')).rejects.toThrow('disk full');
        expect(registry.names()).toEqual(['A', 'B']);

        await pump.ingestLine('Time:2,A:3,B:6');

        expect(sink.headerHistory).toEqual([['Time', 'A'], ['Time', 'A', 'B']]);
        expect(sink.rows).toEqual([[0, 1], [2, 3, 6]]);
    });

    it('reports the outcome of each line', async () => {
        const { pump } = setup({ windowSize: 1 });
        await pump.ingestLine('Time:0,A:1');
        const outcome = await pump.ingestLine('Time:5,A:2,bad,B:3');

        expect(outcome).toEqual({
            status: 'accepted',
            timestamp: 5,
            newSignals: ['B'],
            windowStart: 1,
            skipped: [{ field: 'bad', position: 2 }],
        });
    });

    it('drops a line without Time, reports it and keeps the data intact', async () => {
        const errors: Array<{ error: SerialscopeError; line: string | null }> = [];
        const warnings: string[] = [];
        const { pump, store, sink } = setup({
            onError: (error, line) => errors.push({ error, line }),
            logger: { warn: (msg) => warnings.push(msg) },
        });

        await pump.ingestLine('Time:0,A:1');
        const outcome = await pump.ingestLine('A:9');
        await pump.ingestLine('Time:1,A:2');

        expect(outcome.status).toBe('dropped');
        expect(errors).toHaveLength(1);
        expect(errors[0].error).toBeInstanceOf(DecodeError);
        expect(errors[0].line).toBe('A:9');
        expect(warnings).toEqual(['DecodeError: Time value is missing in the received data: "A:9"']);
        expect(store.series('A')).toEqual({ timestamps: [0, 1], values: [1, 2] });
        expect(sink.rows).toEqual([[0, 1], [1, 2]]);
        expect(pump.stats().droppedLines).toBe(1);
        expect(pump.stats().linesAccepted).toBe(2);
    });

    it('hands the time index and window start to the line handler', async () => {
        const calls: Array<[number[], number]> = [];
        const { pump } = setup({
            windowSize: 2,
            lineHandler: (timeIndex, windowStart) => calls.push([timeIndex.slice(), windowStart]),
        });

        for (let t = 0; t <= 4; t++) await pump.ingestLine(`Time:${t},A:${t}`);

        expect(calls[4]).toEqual([[0, 1, 2, 3, 4], 2]);
        expect(calls.map((c) => c[1])).toEqual([0, 0, 0, 1, 2]);
    });

    it('re-reads a window size getter and skips the handler while it is invalid', async () => {
        let windowSize = NaN;
        const handled: number[] = [];
        const errors: SerialscopeError[] = [];
        const { pump, store, sink } = setup({
            windowSize: () => windowSize,
            lineHandler: (_timeIndex, start) => handled.push(start),
            onError: (error) => errors.push(error),
        });

        const outcome = await pump.ingestLine('Time:0,A:1');
        windowSize = 5;
        await pump.ingestLine('Time:1,A:2');

        expect(outcome.status === 'accepted' && outcome.windowStart).toBeNull();
        expect(errors).toHaveLength(1);
        expect(errors[0]).toBeInstanceOf(ConfigError);
        expect(handled).toEqual([0]);
        expect(store.lineCount).toBe(2);
        expect(sink.rows).toHaveLength(2);
    });

    it('counts timestamp regressions without reordering', async () => {
        const warnings: string[] = [];
        const { pump, store } = setup({ logger: { warn: (msg) => warnings.push(msg) } });

        await pump.ingestLine('Time:10,A:1');
        await pump.ingestLine('Time:2,A:2');

        expect(pump.stats().timestampRegressions).toBe(1);
        expect(store.timeIndex()).toEqual([10, 2]);
        expect(warnings).toEqual(['Timestamp went backwards (10 -> 2); window accuracy is degraded']);
    });

    it('feeds per-signal statistics', async () => {
        const stats = new SignalStatsTracker();
        const { pump } = setup({ stats });

        await pump.ingestLine('Time:0,A:1');
        await pump.ingestLine('Time:1,A:3');

        expect(stats.get('A')?.count).toBe(2);
        expect(stats.get('A')?.mean).toBe(2);
    });
});

describe('StreamPump polling loop', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('reads at most one line per tick', async () => {
        const { pump, store } = setup();
        const transport = new MemoryTransport(['Time:0,A:1', 'Time:1,A:2', 'Time:2,A:3']);

        pump.start(transport, null);
        expect(pump.state).toBe('running');

        await vi.advanceTimersByTimeAsync(10);
        expect(store.lineCount).toBe(1);
        await vi.advanceTimersByTimeAsync(10);
        expect(store.lineCount).toBe(2);
        await vi.advanceTimersByTimeAsync(10);
        expect(store.lineCount).toBe(3);
        expect(pump.stats().linesRead).toBe(3);

        await pump.stop();
    });

    it('keeps polling while no line is available', async () => {
        const { pump, store } = setup();
        const transport = new MemoryTransport();

        pump.start(transport);
        await vi.advanceTimersByTimeAsync(50);
        expect(store.lineCount).toBe(0);

        transport.pushBytes('Time:0,A:');
        await vi.advanceTimersByTimeAsync(20);
        expect(store.lineCount).toBe(0);

        transport.pushBytes('4\r\n');
        await vi.advanceTimersByTimeAsync(10);
        expect(store.series('A')).toEqual({ timestamps: [0], values: [4] });

        await pump.stop();
    });

    it('stays running after a decode failure', async () => {
        const errors: SerialscopeError[] = [];
        const { pump, store } = setup({ onError: (error) => errors.push(error) });
        const transport = new MemoryTransport(['Time:0,A:1', 'garbage', 'Time:1,A:2']);

        pump.start(transport);
        await vi.advanceTimersByTimeAsync(30);

        expect(pump.state).toBe('running');
        expect(errors).toHaveLength(1);
        expect(store.series('A').values).toEqual([1, 2]);
        await pump.stop();
    });

    it('schedules no tick after stop and can be started again', async () => {
        const { pump, store } = setup();
        const transport = new MemoryTransport(['Time:0,A:1', 'Time:1,A:2', 'Time:2,A:3']);

        pump.start(transport);
        await vi.advanceTimersByTimeAsync(10);
        await pump.stop();
        expect(pump.state).toBe('idle');

        await vi.advanceTimersByTimeAsync(100);
        expect(store.lineCount).toBe(1);
        expect(transport.queuedLines).toBe(2);

        pump.start(transport);
        await vi.advanceTimersByTimeAsync(20);
        expect(store.lineCount).toBe(3);
        await pump.stop();
    });

    it('refuses to start twice', async () => {
        const { pump } = setup();
        pump.start(new MemoryTransport());
        expect(() => pump.start(new MemoryTransport())).toThrow(PumpStateError);
        await pump.stop();
    });

    it('stops and reports when the sink fails', async () => {
        const errors: SerialscopeError[] = [];
        const registry = new SignalRegistry();
        const store = new SampleStore(registry);
        const pump = new StreamPump(registry, store, {
            tickIntervalMs: 10,
            onError: (error) => errors.push(error),
            sink: {
                onSchemaChanged: () => undefined,
                onLine: async () => { throw new Error('disk full'); },
            },
        });

        pump.start(new MemoryTransport(['Time:0,A:1', 'Time:1,A:2']));
        await vi.advanceTimersByTimeAsync(50);

        expect(pump.state).toBe('idle');
        expect(errors).toHaveLength(1);
        expect(errors[0]).toBeInstanceOf(SerialscopeError);
        expect(errors[0].message).toBe('Pump tick failed: Error: disk full');
        expect(pump.stats().lastError).toBe(errors[0]);
        expect(store.lineCount).toBe(1);
    });

    it('never ingests two lines at once when restarted before stop resolved', async () => {
        let active = 0;
        let maxActive = 0;
        const { pump, store } = setup({
            sink: {
                onSchemaChanged: () => undefined,
                onLine: async () => {
                    active++;
                    maxActive = Math.max(maxActive, active);
                    await new Promise((resolve) => setTimeout(resolve, 50));
                    active--;
                },
            },
        });
        const transport = new MemoryTransport(['Time:0,A:1', 'Time:1,A:2', 'Time:2,A:3']);

        pump.start(transport);
        await vi.advanceTimersByTimeAsync(15);
        const stopping = pump.stop();
        pump.start(transport);
        await vi.advanceTimersByTimeAsync(200);
        await stopping;

        expect(maxActive).toBe(1);
        expect(store.lineCount).toBe(3);

        const stopped = pump.stop();
        await vi.advanceTimersByTimeAsync(100);
        await stopped;
        expect(active).toBe(0);
    });

    it('goes idle when the error callback itself throws', async () => {
        const registry = new SignalRegistry();
        const store = new SampleStore(registry);
        const pump = new StreamPump(registry, store, {
            tickIntervalMs: 10,
            onError: () => { throw new Error('callback broke'); },
            sink: {
                onSchemaChanged: () => undefined,
                onLine: () => { throw new Error('disk full'); },
            },
        });

        pump.start(new MemoryTransport(['Time:0,A:1', 'Time:1,A:2']));
        await vi.advanceTimersByTimeAsync(50);

        expect(pump.state).toBe('idle');
        expect(pump.stats().lastError?.message).toBe('Error callback failed: Error: callback broke');
        expect(store.lineCount).toBe(1);
    });
});
