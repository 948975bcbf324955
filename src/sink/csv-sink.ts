import * as fs from 'fs/promises';
import { createWriteStream, WriteStream, existsSync } from 'fs';
import * as path from 'path';
import type { PersistenceSink, SerialscopeLogger } from '../types.js';

export interface CsvFileSinkOptions {
    logger?: SerialscopeLogger | null;
}

export function formatCsvValue(value: number): string {
    if (Number.isNaN(value)) return 'NaN';
    if (value === Infinity) return 'Inf';
    if (value === -Infinity) return '-Inf';
    return String(value);
}

/**
 * Append-mode CSV writer.
 *
 * The first header starts a fresh file. Later header changes rewrite the first line in place
 * and keep the rows already written; those rows simply have fewer columns.
 */
export class CsvFileSink implements PersistenceSink {
    private readonly filePath: string;
    private writeStream: WriteStream | null = null;
    private headerWritten = false;
    private readonly logger: SerialscopeLogger | null;
    private _rows = 0;

    constructor(filePath: string, options: CsvFileSinkOptions = {}) {
        this.filePath = filePath;
        this.logger = options.logger ?? null;
    }

    private async ensureOpen(): Promise<WriteStream> {
        if (!this.writeStream) {
            await fs.mkdir(path.dirname(this.filePath), { recursive: true });
            this.writeStream = createWriteStream(this.filePath, { flags: 'a' });
        }
        return this.writeStream;
    }

    async onSchemaChanged(headers: readonly string[]): Promise<void> {
        await this.close();

        const headerLine = `${headers.join(',')}\n`;
        let body = '';
        if (this.headerWritten && existsSync(this.filePath)) {
            const content = await fs.readFile(this.filePath, 'utf8');
            const firstBreak = content.indexOf('\n');
            body = firstBreak >= 0 ? content.slice(firstBreak + 1) : '';
        }

        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.writeFile(this.filePath, headerLine + body, 'utf8');
        this.headerWritten = true;
        this.logger?.info?.(`CSV header: ${headers.join(',')}`);
    }

    async onLine(values: readonly number[]): Promise<void> {
        const stream = await this.ensureOpen();
        const row = `${values.map(formatCsvValue).join(',')}\n`;

        await new Promise<void>((resolve, reject) => {
            stream.write(row, (err) => {
                if (err) reject(err);
                else resolve();
            });
        });
        this._rows++;
    }

    async close(): Promise<void> {
        const stream = this.writeStream;
        if (!stream) return;
        await new Promise<void>((resolve, reject) => {
            stream.end((err?: Error | null) => {
                if (err) reject(err);
                else resolve();
            });
        });
        this.writeStream = null;
    }

    get rows(): number {
        return this._rows;
    }

    get path(): string {
        return this.filePath;
    }
}
