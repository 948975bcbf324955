/**
 * serialscope public API
 *
 * @module serialscope
 */

export { decodeLine, decodeLineOrThrow, parseNumeric, TIME_KEY } from './decoder/line-decoder.js';
export type { DecodedLine, DecodeResult, MalformedField } from './decoder/line-decoder.js';
export { SignalRegistry } from './registry/signal-registry.js';
export type { Registration } from './registry/signal-registry.js';
export { SampleStore } from './store/sample-store.js';
export type { StoreSnapshot, SeriesSnapshot } from './store/sample-store.js';
export { StreamPump } from './pump/stream-pump.js';
export type { PumpState, PumpStats, IngestOutcome, StreamPumpOptions, WindowSizeSource } from './pump/stream-pump.js';
export { RenderSelector, DEFAULT_PALETTE } from './selector/render-selector.js';
export type { RenderSelectorOptions, SignalAddedListener } from './selector/render-selector.js';
export { CsvFileSink, formatCsvValue } from './sink/csv-sink.js';
export { MemorySink } from './sink/memory-sink.js';
export { LineFramer } from './transport/line-framer.js';
export { StreamTransport, connectTcp } from './transport/stream-transport.js';
export type { StreamTransportOptions, TcpTransportOptions } from './transport/stream-transport.js';
export { MemoryTransport } from './transport/memory-transport.js';
export { SignalStatsTracker } from './insight/signal-stats.js';
export type { SignalStats, SignalStatsConfig, TrendDirection } from './insight/signal-stats.js';
export {
    packSession,
    unpackSession,
    snapshotSession,
    restoreSession,
    saveSessionArchive,
    loadSessionArchive,
    ARCHIVE_VERSION,
} from './archive/session-archive.js';
export type { SessionSnapshot, ArchivedSignal, PackOptions, UnpackOptions } from './archive/session-archive.js';
export { PlotterSession } from './session.js';
export type { PlotterSessionOptions } from './session.js';
export { resolveConfig, assertWindowSize, DEFAULT_CONFIG, ENV_KEYS } from './config.js';
export type { SerialscopeConfig, TransportConfig } from './config.js';
export {
    SerialscopeError,
    DecodeError,
    StoreError,
    ConfigError,
    PumpStateError,
    ArchiveError,
} from './errors.js';
export type { DecodeErrorKind, StoreErrorKind, ConfigErrorKind } from './errors.js';
export type {
    SerialscopeLogger,
    SeriesView,
    Viewport,
    LineTransport,
    PersistenceSink,
    Renderer,
    SchemaListener,
    LineHandler,
} from './types.js';
