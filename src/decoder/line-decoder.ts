/**
 * Line Decoder
 *
 * Wire format: `Time:<t>,<name>:<value>,...`: comma separated `key:value` fields,
 * no escaping, keys trimmed. Stateless.
 */

import { DecodeError } from '../errors.js';

export const TIME_KEY = 'Time';

const FIELD_SEPARATOR = ',';
const PAIR_SEPARATOR = ':';

const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INFINITY_RE = /^([+-]?)inf(inity)?$/i;

/** A sub-field that was skipped because it is not a single `key:value` pair. */
export interface MalformedField {
    field: string;
    /** Zero-based position of the field within the line. */
    position: number;
}

export interface DecodedLine {
    timestamp: number;
    /** Sample values keyed by signal name, in first-appearance order. */
    samples: Map<string, number>;
    skipped: MalformedField[];
}

export type DecodeResult =
    | { ok: true; value: DecodedLine }
    | { ok: false; error: DecodeError };

/**
 * Parses a numeric field value. Anything that is not a plain decimal number
 * (or Inf/NaN) becomes NaN instead of failing the line.
 */
export function parseNumeric(raw: string): number {
    const text = raw.trim();
    if (DECIMAL_RE.test(text)) return Number(text);

    const inf = INFINITY_RE.exec(text);
    if (inf) return inf[1] === '-' ? -Infinity : Infinity;

    return NaN;
}

export function decodeLine(line: string): DecodeResult {
    const fields = line.split(FIELD_SEPARATOR);
    const samples = new Map<string, number>();
    const skipped: MalformedField[] = [];
    let timestamp: number | undefined;

    for (let i = 0; i < fields.length; i++) {
        const pair = fields[i].split(PAIR_SEPARATOR);
        const name = pair.length === 2 ? pair[0].trim() : '';
        if (name.length === 0) {
            skipped.push({ field: fields[i], position: i });
            continue;
        }

        const value = parseNumeric(pair[1]);
        if (name === TIME_KEY) {
            timestamp = value;
        } else {
            samples.set(name, value);
        }
    }

    if (timestamp === undefined) {
        return { ok: false, error: new DecodeError('MissingTimestamp', line) };
    }
    if (Number.isNaN(timestamp)) {
        return { ok: false, error: new DecodeError('InvalidTimestamp', line) };
    }

    return { ok: true, value: { timestamp, samples, skipped } };
}

export function decodeLineOrThrow(line: string): DecodedLine {
    const result = decodeLine(line);
    if (!result.ok) throw result.error;
    return result.value;
}
