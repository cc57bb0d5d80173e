import {
    COMMAND_ACK_TIMEOUT_MS,
    DEFAULT_FEEDRATE_MM_PER_MIN,
    HOME_ALL_COMMAND,
    HOME_TIMEOUT_MS,
    LINEAR_MOVE_COMMAND,
    MAX_STALE_LINES,
    MOTION_COMPLETION_TIMEOUT_MS,
    POSITION_QUERY_WINDOW_MS,
    REPORT_POSITION_COMMAND,
    WAIT_FOR_MOVES_COMMAND,
} from '@/constants/control';
import { ConnectionError, ProtocolError, ProtocolTimeoutError } from '@/errors';
import { silentLogger, type Logger } from '@/services/logStore';
import { LineDecoder } from '@/services/motion/lineDecoder';
import { isPositionLine, parsePositionLine } from '@/services/motion/positionParser';
import type { MotionLinkState, StageAxis, StagePoint } from '@/types';
import { roundAxis } from '@/utils/plateGeometry';

/** Bidirectional byte link to the motion controller. */
export interface ByteStream {
    write: (data: string) => Promise<void>;
    onData: (listener: (chunk: Uint8Array) => void) => () => void;
    onClose: (listener: (error?: Error) => void) => () => void;
    close: () => Promise<void>;
}

export interface CommandAck {
    command: string;
    /** Line that terminated the exchange */
    response: string;
    /** Lines received before the terminating one */
    lines: string[];
}

export interface SendOptions {
    timeoutMs?: number;
}

export interface MotionSessionParams {
    portPath?: string | null;
    logger?: Logger;
    ackTimeoutMs?: number;
    motionTimeoutMs?: number;
    homeTimeoutMs?: number;
    positionWindowMs?: number;
    feedrate?: number;
    /** Oldest unsolicited lines are dropped past this count */
    maxStaleLines?: number;
}

type ExchangeOutcome =
    | { kind: 'ok'; response: string; lines: string[] }
    | { kind: 'timeout'; lines: string[] };

type StateListener = (state: MotionLinkState) => void;

type LineWaiter = (line: string | null) => void;

const LOG_SCOPE = 'motion';

const ERROR_TOKEN_REGEX = /error/i;
const OK_TOKEN_REGEX = /ok/i;

const AXIS_LETTERS: Record<StageAxis, string> = { x: 'X', y: 'Y', z: 'Z' };

const formatAxis = (value: number): string => roundAxis(value).toFixed(2);

export const formatMoveCommand = (target: Partial<StagePoint>, feedrate: number): string => {
    const words = (['x', 'y', 'z'] as const)
        .filter((axis) => target[axis] !== undefined)
        .map((axis) => `${AXIS_LETTERS[axis]}${formatAxis(target[axis] ?? 0)}`);
    return [LINEAR_MOVE_COMMAND, ...words, `F${Math.round(feedrate)}`].join(' ');
};

/**
 * Command/acknowledgment exchange with a G-code controller. Commands are
 * serialised through a promise chain, so concurrent callers queue instead of
 * interleaving their writes and replies.
 */
export class MotionSession {
    private readonly stream: ByteStream;

    private readonly decoder = new LineDecoder();

    private readonly logger: Logger;

    private readonly ackTimeoutMs: number;

    private readonly motionTimeoutMs: number;

    private readonly homeTimeoutMs: number;

    private readonly positionWindowMs: number;

    private readonly feedrate: number;

    private readonly maxStaleLines: number;

    private readonly listeners = new Set<StateListener>();

    private readonly detachers: Array<() => void> = [];

    private inbox: string[] = [];

    private lineWaiter: LineWaiter | null = null;

    private queue: Promise<void> = Promise.resolve();

    private closed = false;

    private lastPosition: StagePoint | null = null;

    private currentState: MotionLinkState;

    constructor(stream: ByteStream, params: MotionSessionParams = {}) {
        this.stream = stream;
        this.logger = params.logger ?? silentLogger;
        this.ackTimeoutMs = params.ackTimeoutMs ?? COMMAND_ACK_TIMEOUT_MS;
        this.motionTimeoutMs = params.motionTimeoutMs ?? MOTION_COMPLETION_TIMEOUT_MS;
        this.homeTimeoutMs = params.homeTimeoutMs ?? HOME_TIMEOUT_MS;
        this.positionWindowMs = params.positionWindowMs ?? POSITION_QUERY_WINDOW_MS;
        this.feedrate = params.feedrate ?? DEFAULT_FEEDRATE_MM_PER_MIN;
        this.maxStaleLines = params.maxStaleLines ?? MAX_STALE_LINES;
        this.currentState = { status: 'connected', portPath: params.portPath ?? null };
        this.detachers.push(stream.onData(this.handleData), stream.onClose(this.handleClose));
    }

    public getState(): MotionLinkState {
        return this.currentState;
    }

    public onStateChange(listener: StateListener): () => void {
        this.listeners.add(listener);
        listener(this.currentState);
        return () => this.listeners.delete(listener);
    }

    /** Last commanded or reported position; null until one is known. */
    public getLastPosition(): StagePoint | null {
        return this.lastPosition;
    }

    public isOpen(): boolean {
        return !this.closed;
    }

    /**
     * Write one command and wait for its acknowledgment. An `error` line wins
     * over `ok` and rejects with ProtocolError.
     */
    public send(command: string, options: SendOptions = {}): Promise<CommandAck> {
        const timeoutMs = options.timeoutMs ?? this.ackTimeoutMs;
        return this.enqueue(async () => {
            const outcome = await this.exchange(command, timeoutMs);
            if (outcome.kind === 'timeout') {
                this.logger.logWarning(LOG_SCOPE, `No acknowledgment for ${command}`, { timeoutMs });
                throw new ProtocolTimeoutError(command, timeoutMs);
            }
            return { command, response: outcome.response, lines: outcome.lines };
        });
    }

    /** Linear move followed by M400, so the promise settles once the stage has stopped. */
    public async moveTo(target: StagePoint, feedrate: number = this.feedrate): Promise<StagePoint> {
        const rounded: StagePoint = {
            x: roundAxis(target.x),
            y: roundAxis(target.y),
            z: roundAxis(target.z),
        };
        await this.send(formatMoveCommand(rounded, feedrate));
        await this.send(WAIT_FOR_MOVES_COMMAND, { timeoutMs: this.motionTimeoutMs });
        this.lastPosition = rounded;
        return rounded;
    }

    /** Jog one axis relative to the last known position. */
    public async moveRelative(
        axis: StageAxis,
        delta: number,
        feedrate: number = this.feedrate,
    ): Promise<StagePoint> {
        if (!Number.isFinite(delta)) {
            throw new RangeError(`Jog distance must be a finite number, got ${delta}`);
        }
        const base = this.lastPosition ?? (await this.queryPosition());
        if (!base) {
            throw new ProtocolError(REPORT_POSITION_COMMAND, 'no position report before jog');
        }
        const next: StagePoint = { ...base };
        next[axis] = roundAxis(base[axis] + delta);
        const jog: Partial<StagePoint> = {};
        jog[axis] = next[axis];
        await this.send(formatMoveCommand(jog, feedrate));
        await this.send(WAIT_FOR_MOVES_COMMAND, { timeoutMs: this.motionTimeoutMs });
        this.lastPosition = next;
        return next;
    }

    public async home(): Promise<StagePoint | null> {
        await this.send(HOME_ALL_COMMAND, { timeoutMs: this.homeTimeoutMs });
        this.updateState({ ...this.currentState, status: 'homed', lastError: undefined });
        this.logger.logInfo(LOG_SCOPE, 'Stage homed');
        this.lastPosition = null;
        return this.queryPosition();
    }

    /**
     * M114. Resolves null when no parseable position line arrives within the
     * query window or the controller answers with an error.
     */
    public queryPosition(): Promise<StagePoint | null> {
        return this.enqueue(async () => {
            let outcome: ExchangeOutcome;
            try {
                outcome = await this.exchange(REPORT_POSITION_COMMAND, this.positionWindowMs);
            } catch (error) {
                if (error instanceof ProtocolError) {
                    this.logger.logWarning(LOG_SCOPE, 'Position query rejected', {
                        response: error.response,
                    });
                    return null;
                }
                throw error;
            }
            const candidates = outcome.kind === 'ok' ? [...outcome.lines, outcome.response] : outcome.lines;
            for (const line of candidates) {
                if (!isPositionLine(line)) {
                    continue;
                }
                const parsed = parsePositionLine(line);
                if (parsed.ok) {
                    this.lastPosition = parsed.value;
                    return parsed.value;
                }
                this.logger.logWarning(LOG_SCOPE, parsed.error.message);
            }
            return null;
        });
    }

    public async close(): Promise<void> {
        if (this.closed) {
            return;
        }
        this.closed = true;
        this.detachers.splice(0).forEach((detach) => detach());
        this.releaseWaiter();
        try {
            await this.stream.close();
        } finally {
            this.updateState({ status: 'disconnected', portPath: this.currentState.portPath });
        }
    }

    private enqueue<T>(task: () => Promise<T>): Promise<T> {
        const run = this.queue.then(task);
        // the caller observes the rejection; the chain only orders commands
        this.queue = run.then(
            () => undefined,
            () => undefined,
        );
        return run;
    }

    private async exchange(command: string, timeoutMs: number): Promise<ExchangeOutcome> {
        if (this.closed) {
            throw new ConnectionError('Motion link is closed', this.currentState.portPath);
        }
        if (this.inbox.length > 0) {
            this.logger.logInfo(LOG_SCOPE, 'Discarding stale controller lines', {
                lines: this.inbox.slice(),
            });
            this.inbox = [];
        }

        try {
            await this.stream.write(`${command}\n`);
        } catch (error) {
            throw new ConnectionError(
                `Failed to write "${command}": ${error instanceof Error ? error.message : String(error)}`,
                this.currentState.portPath,
                { cause: error },
            );
        }

        const deadline = Date.now() + timeoutMs;
        const lines: string[] = [];
        for (;;) {
            const line = await this.nextLine(deadline);
            if (line === null) {
                if (this.closed) {
                    throw new ConnectionError(
                        `Motion link closed while waiting for "${command}"`,
                        this.currentState.portPath,
                    );
                }
                return { kind: 'timeout', lines };
            }
            if (ERROR_TOKEN_REGEX.test(line)) {
                this.logger.logError(LOG_SCOPE, `Controller error for ${command}`, { response: line });
                throw new ProtocolError(command, line);
            }
            if (OK_TOKEN_REGEX.test(line)) {
                return { kind: 'ok', response: line, lines };
            }
            lines.push(line);
        }
    }

    private nextLine(deadline: number): Promise<string | null> {
        const queued = this.inbox.shift();
        if (queued !== undefined) {
            return Promise.resolve(queued);
        }
        const remaining = deadline - Date.now();
        if (remaining <= 0 || this.closed) {
            return Promise.resolve(null);
        }
        return new Promise((resolve) => {
            const timer = setTimeout(() => {
                this.lineWaiter = null;
                resolve(null);
            }, remaining);
            this.lineWaiter = (line) => {
                clearTimeout(timer);
                this.lineWaiter = null;
                resolve(line);
            };
        });
    }

    private releaseWaiter(): void {
        this.lineWaiter?.(null);
    }

    private handleData = (chunk: Uint8Array): void => {
        for (const line of this.decoder.push(chunk)) {
            if (this.lineWaiter) {
                this.lineWaiter(line);
            } else {
                this.inbox.push(line);
                if (this.inbox.length > this.maxStaleLines) {
                    this.inbox.shift();
                }
            }
        }
    };

    private handleClose = (error?: Error): void => {
        if (this.closed) {
            return;
        }
        this.closed = true;
        this.detachers.splice(0).forEach((detach) => detach());
        this.releaseWaiter();
        this.logger.logWarning(LOG_SCOPE, 'Motion link closed', { error: error?.message });
        this.updateState({
            status: 'disconnected',
            portPath: this.currentState.portPath,
            lastError: error?.message,
        });
    };

    private updateState(state: MotionLinkState): void {
        this.currentState = state;
        this.listeners.forEach((listener) => listener(state));
    }
}
