import { ConfigError } from './errors.js';

export interface TransportConfig {
    /** Port name, e.g. `COM10` or `/dev/ttyACM0`. */
    port: string;
    baudRate: number;
}

export interface SerialscopeConfig extends TransportConfig {
    /** Trailing time window, in the unit of the `Time` field. */
    windowSize: number;
    /** Ingest polling period. */
    tickIntervalMs: number;
    /** Redraw period of the render tick. */
    renderIntervalMs: number;
    /** CSV output file; null disables persistence. */
    csvPath: string | null;
}

export const DEFAULT_CONFIG: Readonly<SerialscopeConfig> = {
    windowSize: 10,
    tickIntervalMs: 10,
    renderIntervalMs: 50,
    port: 'COM10',
    baudRate: 9600,
    csvPath: null,
};

export const ENV_KEYS = {
    windowSize: 'SERIALSCOPE_WINDOW_SIZE',
    tickIntervalMs: 'SERIALSCOPE_TICK_MS',
    renderIntervalMs: 'SERIALSCOPE_RENDER_MS',
    port: 'SERIALSCOPE_PORT',
    baudRate: 'SERIALSCOPE_BAUD_RATE',
    csvPath: 'SERIALSCOPE_CSV_PATH',
} as const;

export function assertWindowSize(windowSize: number): number {
    if (Number.isNaN(windowSize) || windowSize <= 0) {
        throw new ConfigError('InvalidWindowSize', `Invalid window size: ${windowSize} (must be > 0)`);
    }
    return windowSize;
}

export function assertInterval(intervalMs: number, label: string): number {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
        throw new ConfigError('InvalidTickInterval', `Invalid ${label}: ${intervalMs} (must be a positive number of ms)`);
    }
    return intervalMs;
}

export function assertTransportConfig(config: TransportConfig): TransportConfig {
    if (config.port.trim().length === 0) {
        throw new ConfigError('InvalidTransport', 'Port name must not be empty');
    }
    if (!Number.isInteger(config.baudRate) || config.baudRate <= 0) {
        throw new ConfigError('InvalidTransport', `Invalid baud rate: ${config.baudRate}`);
    }
    return config;
}

function envNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return undefined;
    return Number(raw);
}

function envString(env: NodeJS.ProcessEnv, key: string): string | undefined {
    const raw = env[key];
    return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
}

/**
 * Explicit options win over environment variables, which win over defaults.
 */
export function resolveConfig(options: Partial<SerialscopeConfig> = {}, env: NodeJS.ProcessEnv = process.env): SerialscopeConfig {
    const config: SerialscopeConfig = {
        windowSize: options.windowSize ?? envNumber(env, ENV_KEYS.windowSize) ?? DEFAULT_CONFIG.windowSize,
        tickIntervalMs: options.tickIntervalMs ?? envNumber(env, ENV_KEYS.tickIntervalMs) ?? DEFAULT_CONFIG.tickIntervalMs,
        renderIntervalMs: options.renderIntervalMs ?? envNumber(env, ENV_KEYS.renderIntervalMs) ?? DEFAULT_CONFIG.renderIntervalMs,
        port: options.port ?? envString(env, ENV_KEYS.port) ?? DEFAULT_CONFIG.port,
        baudRate: options.baudRate ?? envNumber(env, ENV_KEYS.baudRate) ?? DEFAULT_CONFIG.baudRate,
        csvPath: options.csvPath !== undefined ? options.csvPath : (envString(env, ENV_KEYS.csvPath) ?? DEFAULT_CONFIG.csvPath),
    };

    assertWindowSize(config.windowSize);
    assertInterval(config.tickIntervalMs, 'tick interval');
    assertInterval(config.renderIntervalMs, 'render interval');
    assertTransportConfig(config);
    return config;
}
