/**
 * Line transport over Node streams.
 *
 * Wraps anything that emits bytes (a serial port object, a TCP socket, stdin) and
 * queues complete lines until the pump polls for them.
 */

import * as net from 'net';
import type { Readable, Writable } from 'stream';
import { assertTransportConfig, type TransportConfig } from '../config.js';
import { ConfigError, SerialscopeError } from '../errors.js';
import type { LineTransport, SerialscopeLogger } from '../types.js';
import { LineFramer } from './line-framer.js';

export interface StreamTransportOptions {
    /** Where outbound command lines go. Defaults to `input` when it is also writable. */
    output?: Writable | null;
    /** Destroy the input stream on close (off for stdin). Default true. */
    destroyOnClose?: boolean;
    /** Port name and baud rate of the device behind the stream, for display. */
    config?: TransportConfig | null;
    logger?: SerialscopeLogger | null;
}

export class StreamTransport implements LineTransport {
    private readonly framer = new LineFramer();
    private readonly queue: string[] = [];
    private readonly output: Writable | (Readable & Writable) | null;
    private readonly destroyOnClose: boolean;
    private readonly logger: SerialscopeLogger | null;
    private _ended = false;
    private _error: Error | null = null;
    private closed = false;

    readonly config: TransportConfig | null;

    private readonly onData = (chunk: string | Buffer): void => {
        for (const line of this.framer.push(chunk)) {
            this.queue.push(line);
        }
    };

    private readonly onEnd = (): void => {
        const rest = this.framer.flush();
        if (rest !== null) this.queue.push(rest);
        this._ended = true;
    };

    private readonly onStreamError = (err: Error): void => {
        this._error = err;
        this._ended = true;
        this.logger?.warn?.(`Transport error: ${err.message}`);
    };

    constructor(private readonly input: Readable, options: StreamTransportOptions = {}) {
        this.output = options.output !== undefined ? options.output : (isWritable(input) ? input : null);
        this.destroyOnClose = options.destroyOnClose ?? true;
        this.config = options.config ? assertTransportConfig(options.config) : null;
        this.logger = options.logger ?? null;

        input.on('data', this.onData);
        input.on('end', this.onEnd);
        input.on('error', this.onStreamError);
    }

    isLineAvailable(): boolean {
        return this.queue.length > 0;
    }

    readLine(): string {
        const line = this.queue.shift();
        if (line === undefined) {
            throw new SerialscopeError('readLine() called with no line available');
        }
        return line;
    }

    async writeLine(line: string): Promise<void> {
        const output = this.output;
        if (!output || this.closed) {
            throw new ConfigError('InvalidTransport', 'Transport has no writable side');
        }
        await new Promise<void>((resolve, reject) => {
            output.write(`${line}\n`, (err) => {
                if (err) reject(err);
                else resolve();
            });
        });
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        this.input.off('data', this.onData);
        this.input.off('end', this.onEnd);
        this.input.off('error', this.onStreamError);

        if (this.output && this.output !== this.input) {
            const output = this.output;
            await new Promise<void>((resolve) => output.end(() => resolve()));
        }
        if (this.destroyOnClose) {
            this.input.destroy();
        } else {
            // Caller-owned input (stdin): stop the flow, keep the stream.
            this.input.pause();
        }
    }

    /** True once the input stream ended or failed; queued lines may still be readable. */
    get ended(): boolean {
        return this._ended;
    }

    get error(): Error | null {
        return this._error;
    }

    get queuedLines(): number {
        return this.queue.length;
    }
}

function isWritable(stream: Readable): stream is Readable & Writable {
    return 'write' in stream && typeof stream.write === 'function';
}

export interface TcpTransportOptions {
    host: string;
    port: number;
    logger?: SerialscopeLogger | null;
}

/**
 * Connects to a TCP serial bridge (ser2net style) and wraps the socket.
 */
export function connectTcp(options: TcpTransportOptions): Promise<StreamTransport> {
    return new Promise((resolve, reject) => {
        const socket = net.createConnection({ host: options.host, port: options.port });
        const onConnectError = (err: Error): void => reject(err);
        socket.once('error', onConnectError);
        socket.once('connect', () => {
            socket.off('error', onConnectError);
            options.logger?.info?.(`Connected to ${options.host}:${options.port}`);
            resolve(new StreamTransport(socket, { logger: options.logger }));
        });
    });
}
