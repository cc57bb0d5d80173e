import { MAX_PENDING_LINE_BYTES } from '@/constants/control';

const LF = 0x0a;
const CR = 0x0d;

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

/** Strict UTF-8, falling back to latin-1 (which maps every byte) on invalid input. */
export const decodeLineBytes = (bytes: Uint8Array): string => {
    try {
        return strictUtf8.decode(bytes);
    } catch {
        return Buffer.from(bytes).toString('latin1');
    }
};

export interface LineDecoderOptions {
    /** An unterminated line longer than this is discarded */
    maxPendingBytes?: number;
}

/**
 * Reassembles arbitrarily fragmented chunks into complete lines. Line
 * terminator is LF; a trailing CR is dropped and blank lines are skipped.
 */
export class LineDecoder {
    private pending: Buffer = Buffer.alloc(0);

    private readonly maxPendingBytes: number;

    private discarded = 0;

    constructor(options: LineDecoderOptions = {}) {
        this.maxPendingBytes = options.maxPendingBytes ?? MAX_PENDING_LINE_BYTES;
    }

    public push(chunk: Uint8Array | string): string[] {
        const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk);
        this.pending = this.pending.length > 0 ? Buffer.concat([this.pending, bytes]) : bytes;

        const lines: string[] = [];
        let start = 0;
        let newline = this.pending.indexOf(LF, start);
        while (newline !== -1) {
            let end = newline;
            if (end > start && this.pending[end - 1] === CR) {
                end -= 1;
            }
            const line = decodeLineBytes(this.pending.subarray(start, end)).trim();
            if (line.length > 0) {
                lines.push(line);
            }
            start = newline + 1;
            newline = this.pending.indexOf(LF, start);
        }
        this.pending = Buffer.from(this.pending.subarray(start));
        if (this.pending.length > this.maxPendingBytes) {
            this.discarded += this.pending.length;
            this.pending = Buffer.alloc(0);
        }
        return lines;
    }

    /** Bytes of an unterminated line still waiting for its LF. */
    public get pendingBytes(): number {
        return this.pending.length;
    }

    /** Total bytes dropped from overlong unterminated lines. */
    public get discardedBytes(): number {
        return this.discarded;
    }

    public reset(): void {
        this.pending = Buffer.alloc(0);
    }
}
