/**
 * Splits a byte/text stream into newline-terminated lines.
 * A trailing `\r` is dropped so CRLF senders (e.g. `Serial.println`) frame the same as LF.
 */
export class LineFramer {
    private buffer = '';

    push(chunk: string | Buffer): string[] {
        this.buffer += typeof chunk === 'string' ? chunk : chunk.toString('utf8');

        const lines = this.buffer.split('\n');
        this.buffer = lines.pop() ?? '';
        return lines.map(stripCarriageReturn);
    }

    /** Returns the unterminated remainder, if any, and clears it. */
    flush(): string | null {
        const rest = this.buffer;
        this.buffer = '';
        return rest.length > 0 ? stripCarriageReturn(rest) : null;
    }

    get pending(): number {
        return this.buffer.length;
    }
}

function stripCarriageReturn(line: string): string {
    return line.endsWith('\r') ? line.slice(0, -1) : line;
}
