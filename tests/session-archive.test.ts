import * as path from 'path';
import { SignalRegistry } from '../src/registry/signal-registry.js';
import { SampleStore } from '../src/store/sample-store.js';
import {
    loadSessionArchive,
    packSession,
    restoreSession,
    saveSessionArchive,
    snapshotSession,
    unpackSession,
    type SessionSnapshot,
} from '../src/archive/session-archive.js';
import { ArchiveError } from '../src/errors.js';
import { withTempDir } from './helpers/test-utils.js';

function buildSession() {
    const registry = new SignalRegistry();
    registry.registerIfNew('A');
    registry.registerIfNew('B');
    const store = new SampleStore(registry);
    store.appendLine(0, new Map([['A', 1]]));
    store.appendLine(1, new Map([['A', NaN], ['B', Infinity]]));
    store.appendLine(2, new Map([['B', -Infinity]]));
    registry.setIncluded('B', false);
    return { registry, store };
}

describe('session archive', () => {
    it('round-trips series, line positions and non-finite values', async () => {
        const { registry, store } = buildSession();
        const snapshot = snapshotSession(registry, store);

        const packed = await packSession(snapshot);
        expect(Array.from(packed.subarray(0, 5))).toEqual([0x53, 0x53, 0x43, 0x50, 1]);

        const restored = await unpackSession(packed);
        expect(restored).toEqual({
            timeIndex: [0, 1, 2],
            signals: [
                { name: 'A', included: true, timestamps: [0, 1], values: [1, NaN], lines: [0, 1] },
                { name: 'B', included: false, timestamps: [1, 2], values: [Infinity, -Infinity], lines: [1, 2] },
            ],
        });
    });

    it('rebuilds a registry and store that window like the source session', async () => {
        const { registry, store } = buildSession();
        const { registry: registry2, store: store2 } = restoreSession(await unpackSession(await packSession(snapshotSession(registry, store))));

        expect(registry2.names()).toEqual(['A', 'B']);
        expect(registry2.isIncluded('B')).toBe(false);
        expect(store2.timeIndex()).toEqual([0, 1, 2]);
        expect(store2.windowStart(1)).toBe(1);
        expect(store2.seriesSince('A', 1)).toEqual({ timestamps: [1], values: [NaN] });
    });

    it('rejects data without the archive magic', async () => {
        await expect(unpackSession(new Uint8Array([1, 2, 3, 4, 5, 6]))).rejects.toThrow('Not a session archive (bad magic)');
    });

    it('rejects an unknown archive version', async () => {
        const { registry, store } = buildSession();
        const packed = await packSession(snapshotSession(registry, store));
        packed[4] = 2;
        await expect(unpackSession(packed)).rejects.toThrow('Unsupported session archive version: 2');
    });

    it('rejects line references outside the time index', async () => {
        const snapshot: SessionSnapshot = {
            timeIndex: [0],
            signals: [{ name: 'A', included: true, timestamps: [0], values: [1], lines: [5] }],
        };
        const packed = await packSession(snapshot);
        await expect(unpackSession(packed)).rejects.toThrow(ArchiveError);
        await expect(unpackSession(packed)).rejects.toThrow('Invalid line reference in signal "A"');
    });

    it('saves to and loads from disk', async () => {
        await withTempDir(async (dir) => {
            const { registry, store } = buildSession();
            const file = path.join(dir, 'nested', 'run.sscp');

            const bytes = await saveSessionArchive(file, registry, store);
            expect(bytes).toBeGreaterThan(5);

            const loaded = await loadSessionArchive(file);
            expect(loaded.signals.map((s) => s.name)).toEqual(['A', 'B']);
            expect(loaded.timeIndex).toEqual([0, 1, 2]);
        });
    });
});
