export type PlateScanErrorKind =
    | 'invalid-well'
    | 'incomplete-corners'
    | 'channel-length-mismatch'
    | 'sensor-read'
    | 'connection'
    | 'no-port-found'
    | 'protocol-timeout'
    | 'protocol'
    | 'run-in-progress';

export class PlateScanError extends Error {
    public readonly kind: PlateScanErrorKind;

    constructor(kind: PlateScanErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PlateScanError';
        this.kind = kind;
    }
}

export class InvalidWellError extends PlateScanError {
    public readonly wellId: string;

    constructor(wellId: string, detail: string) {
        super('invalid-well', `Invalid well "${wellId}": ${detail}`);
        this.name = 'InvalidWellError';
        this.wellId = wellId;
    }
}

export class IncompleteCornersError extends PlateScanError {
    public readonly missing: string[];

    constructor(missing: string[]) {
        super('incomplete-corners', `All four corners must be set. Missing: ${missing.join(', ')}`);
        this.name = 'IncompleteCornersError';
        this.missing = missing;
    }
}

export class ChannelLengthMismatchError extends PlateScanError {
    constructor(message: string) {
        super('channel-length-mismatch', message);
        this.name = 'ChannelLengthMismatchError';
    }
}

export class SensorReadError extends PlateScanError {
    public readonly channel: string;

    constructor(channel: string, message: string) {
        super('sensor-read', message);
        this.name = 'SensorReadError';
        this.channel = channel;
    }
}

export class ConnectionError extends PlateScanError {
    public readonly portPath: string | null;

    constructor(message: string, portPath: string | null = null, options?: { cause?: unknown }) {
        super('connection', message, options);
        this.name = 'ConnectionError';
        this.portPath = portPath;
    }
}

export class NoPortFoundError extends PlateScanError {
    /** Last failure per probed port */
    public readonly attempts: Record<string, string>;

    constructor(attempts: Record<string, string> = {}) {
        const tried = Object.keys(attempts);
        super(
            'no-port-found',
            tried.length > 0
                ? `No serial port responded (tried ${tried.join(', ')})`
                : 'No candidate serial ports found',
        );
        this.name = 'NoPortFoundError';
        this.attempts = attempts;
    }
}

export class ProtocolTimeoutError extends PlateScanError {
    public readonly command: string;

    public readonly timeoutMs: number;

    constructor(command: string, timeoutMs: number) {
        super('protocol-timeout', `No acknowledgment for "${command}" within ${timeoutMs} ms`);
        this.name = 'ProtocolTimeoutError';
        this.command = command;
        this.timeoutMs = timeoutMs;
    }
}

export class ProtocolError extends PlateScanError {
    public readonly command: string;

    /** Controller line that carried the error */
    public readonly response: string;

    constructor(command: string, response: string) {
        super('protocol', `Controller rejected "${command}": ${response}`);
        this.name = 'ProtocolError';
        this.command = command;
        this.response = response;
    }
}

export class RunInProgressError extends PlateScanError {
    constructor(message = 'Capture run already in progress') {
        super('run-in-progress', message);
        this.name = 'RunInProgressError';
    }
}

export interface NormalizedError {
    kind: PlateScanErrorKind | 'unknown';
    message: string;
}

export const isPlateScanError = (error: unknown): error is PlateScanError =>
    error instanceof PlateScanError;

export const describeError = (error: unknown): NormalizedError => {
    if (isPlateScanError(error)) {
        return { kind: error.kind, message: error.message };
    }
    if (error instanceof Error) {
        return { kind: 'unknown', message: error.message };
    }
    if (typeof error === 'string' && error.length > 0) {
        return { kind: 'unknown', message: error };
    }
    return { kind: 'unknown', message: 'Unknown error' };
};
