/**
 * Session archive
 *
 * Layout: [magic "SSCP": 4][version: 1][zstd(JSON payload)]
 * The payload is the full view: signal order, inclusion flags, every series and the time index.
 * Non-finite numbers are written as "NaN" / "Inf" / "-Inf" strings since JSON has no literal for them.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ArchiveError } from '../errors.js';
import { SignalRegistry } from '../registry/signal-registry.js';
import { SampleStore, type SeriesSnapshot } from '../store/sample-store.js';
import { zstdCompress, zstdDecompress } from './zstd.js';

export const ARCHIVE_MAGIC = new Uint8Array([0x53, 0x53, 0x43, 0x50]); // "SSCP"
export const ARCHIVE_VERSION = 1;
const HEADER_SIZE = ARCHIVE_MAGIC.length + 1;
const DEFAULT_MAX_PAYLOAD_BYTES = 256 * 1024 * 1024;

export interface ArchivedSignal extends SeriesSnapshot {
    included: boolean;
}

export interface SessionSnapshot {
    timeIndex: number[];
    signals: ArchivedSignal[];
}

export interface PackOptions {
    /** Zstd level (1-22). Default 3. */
    level?: number;
}

export interface UnpackOptions {
    maxPayloadBytes?: number;
}

export function snapshotSession(registry: SignalRegistry, store: SampleStore): SessionSnapshot {
    const { timeIndex, signals } = store.snapshot();
    return {
        timeIndex,
        signals: signals.map((s) => ({ ...s, included: registry.isIncluded(s.name) })),
    };
}

export function restoreSession(snapshot: SessionSnapshot): { registry: SignalRegistry; store: SampleStore } {
    const registry = new SignalRegistry();
    for (const signal of snapshot.signals) {
        registry.registerIfNew(signal.name);
        registry.setIncluded(signal.name, signal.included);
    }
    const store = SampleStore.fromSnapshot(registry, snapshot);
    return { registry, store };
}

export async function packSession(snapshot: SessionSnapshot, options: PackOptions = {}): Promise<Uint8Array> {
    const json = JSON.stringify({ version: ARCHIVE_VERSION, ...snapshot }, encodeNonFinite);
    const payload = await zstdCompress(Buffer.from(json, 'utf8'), options.level ?? 3);

    const out = new Uint8Array(HEADER_SIZE + payload.length);
    out.set(ARCHIVE_MAGIC, 0);
    out[ARCHIVE_MAGIC.length] = ARCHIVE_VERSION;
    out.set(payload, HEADER_SIZE);
    return out;
}

export async function unpackSession(data: Uint8Array, options: UnpackOptions = {}): Promise<SessionSnapshot> {
    if (data.length < HEADER_SIZE || !ARCHIVE_MAGIC.every((b, i) => data[i] === b)) {
        throw new ArchiveError('Not a session archive (bad magic)');
    }
    const version = data[ARCHIVE_MAGIC.length];
    if (version !== ARCHIVE_VERSION) {
        throw new ArchiveError(`Unsupported session archive version: ${version}`);
    }

    const raw = await zstdDecompress(data.subarray(HEADER_SIZE), options.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES);
    let parsed: unknown;
    try {
        parsed = JSON.parse(Buffer.from(raw).toString('utf8'));
    } catch (e) {
        throw new ArchiveError('Session archive payload is not valid JSON', e);
    }
    return parseSnapshot(parsed);
}

export async function saveSessionArchive(filePath: string, registry: SignalRegistry, store: SampleStore, options: PackOptions = {}): Promise<number> {
    const data = await packSession(snapshotSession(registry, store), options);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, data);
    return data.length;
}

export async function loadSessionArchive(filePath: string, options: UnpackOptions = {}): Promise<SessionSnapshot> {
    const data = await fs.readFile(filePath);
    return unpackSession(new Uint8Array(data.buffer, data.byteOffset, data.byteLength), options);
}

// --- Payload (de)serialization ---

function encodeNonFinite(_key: string, value: unknown): unknown {
    if (typeof value !== 'number' || Number.isFinite(value)) return value;
    if (Number.isNaN(value)) return 'NaN';
    return value > 0 ? 'Inf' : '-Inf';
}

function decodeNumber(value: unknown, where: string): number {
    if (typeof value === 'number') return value;
    if (value === 'NaN') return NaN;
    if (value === 'Inf') return Infinity;
    if (value === '-Inf') return -Infinity;
    throw new ArchiveError(`Invalid number in ${where}`);
}

function decodeNumbers(value: unknown, where: string): number[] {
    if (!Array.isArray(value)) throw new ArchiveError(`Expected an array in ${where}`);
    return value.map((v: unknown) => decodeNumber(v, where));
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseSnapshot(value: unknown): SessionSnapshot {
    if (!isRecord(value)) throw new ArchiveError('Session archive payload is not an object');
    if (value.version !== ARCHIVE_VERSION) {
        throw new ArchiveError(`Unsupported session payload version: ${String(value.version)}`);
    }

    const timeIndex = decodeNumbers(value.timeIndex, 'timeIndex');
    if (!Array.isArray(value.signals)) throw new ArchiveError('Expected an array in signals');

    const seen = new Set<string>();
    const signals = value.signals.map((entry: unknown, i: number): ArchivedSignal => {
        if (!isRecord(entry) || typeof entry.name !== 'string' || typeof entry.included !== 'boolean') {
            throw new ArchiveError(`Invalid signal entry at position ${i}`);
        }
        if (seen.has(entry.name)) throw new ArchiveError(`Duplicate signal "${entry.name}"`);
        seen.add(entry.name);

        const where = `signal "${entry.name}"`;
        const timestamps = decodeNumbers(entry.timestamps, where);
        const values = decodeNumbers(entry.values, where);
        const lines = decodeNumbers(entry.lines, where);
        if (timestamps.length !== values.length || lines.length !== values.length) {
            throw new ArchiveError(`Length mismatch in ${where}`);
        }
        for (let j = 0; j < lines.length; j++) {
            const line = lines[j];
            if (!Number.isInteger(line) || line < 0 || line >= timeIndex.length || (j > 0 && line <= lines[j - 1])) {
                throw new ArchiveError(`Invalid line reference in ${where}`);
            }
        }
        return { name: entry.name, included: entry.included, timestamps, values, lines };
    });

    return { timeIndex, signals };
}
