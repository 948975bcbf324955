#!/usr/bin/env node
/**
 * CLI: serial telemetry recorder
 *
 * Usage:  serialscope [--tcp host:port] [--csv out.csv] [--window 10] [--render 1000] [--archive out.sscp]
 *
 * Reads `Time:t,Name:value,...` lines from a TCP serial bridge, or from stdin when --tcp is absent,
 * writes every line to CSV and prints the latest visible values once per redraw.
 */

import { PlotterSession } from './session.js';
import { StreamTransport, connectTcp } from './transport/stream-transport.js';
import type { LineTransport, Renderer, SerialscopeLogger } from './types.js';

const args = process.argv.slice(2);

function getArg(name: string): string | undefined {
    const idx = args.indexOf(`--${name}`);
    return idx !== -1 && args[idx + 1] ? args[idx + 1] : undefined;
}

function getNumberArg(name: string): number | undefined {
    const raw = getArg(name);
    return raw === undefined ? undefined : Number(raw);
}

const logger: SerialscopeLogger = {
    info: (msg) => console.error(`[serialscope] ${msg}`),
    warn: (msg) => console.error(`[serialscope] WARN ${msg}`),
    error: (msg) => console.error(`[serialscope] ERROR ${msg}`),
};

const statusRenderer: Renderer = {
    redraw(series, order, viewport) {
        const parts: string[] = [];
        for (const name of order) {
            const s = series.get(name);
            if (!s || s.values.length === 0) continue;
            parts.push(`${name}=${s.values[s.values.length - 1]}`);
        }
        const range = viewport ? `[${viewport.start} .. ${viewport.end}]` : '[]';
        console.log(`${range} ${parts.join('  ')}`);
    },
};

async function openTransport(): Promise<{ transport: LineTransport; ended: () => boolean }> {
    const tcp = getArg('tcp');
    if (tcp) {
        const sep = tcp.lastIndexOf(':');
        const host = sep > 0 ? tcp.slice(0, sep) : 'localhost';
        const port = Number(sep >= 0 ? tcp.slice(sep + 1) : tcp);
        const transport = await connectTcp({ host, port, logger });
        return { transport, ended: () => transport.ended && !transport.isLineAvailable() };
    }
    const transport = new StreamTransport(process.stdin, { output: null, destroyOnClose: false, logger });
    return { transport, ended: () => transport.ended && !transport.isLineAvailable() };
}

async function main(): Promise<void> {
    const session = new PlotterSession({
        windowSize: getNumberArg('window'),
        renderIntervalMs: getNumberArg('render') ?? 1000,
        csvPath: getArg('csv'),
        renderer: statusRenderer,
        logger,
    });

    const { transport, ended } = await openTransport();
    session.start(transport);

    let closing = false;
    const shutdown = async (): Promise<void> => {
        if (closing) return;
        closing = true;
        clearInterval(watcher);
        await session.close();
        session.renderFrame();

        const archive = getArg('archive');
        if (archive) {
            const bytes = await session.exportArchive(archive);
            logger.info?.(`Archive written to ${archive} (${bytes} bytes)`);
        }
        for (const s of session.statistics()) {
            logger.info?.(`${s.name}: n=${s.count} min=${s.min} max=${s.max} mean=${s.mean.toFixed(4)} trend=${s.direction}`);
        }
        const stats = session.pumpStats();
        logger.info?.(`${stats.linesAccepted} lines recorded, ${stats.droppedLines} dropped`);
    };

    const watcher = setInterval(() => {
        if (ended() || session.pumpStats().state === 'idle') {
            shutdown().catch(fail);
        }
    }, 100);

    process.once('SIGINT', () => {
        shutdown().catch(fail);
    });
}

function fail(e: unknown): void {
    logger.error?.(e instanceof Error ? e.message : String(e));
    process.exitCode = 1;
}

main().catch(fail);
