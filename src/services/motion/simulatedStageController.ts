import type { ByteStream } from '@/services/motion/motionSession';
import type { StagePoint } from '@/types';

export interface SimulatedStageOptions {
    /** Replies are delivered in chunks of this many bytes */
    fragmentSize?: number;
    replyDelayMs?: number;
    initialPosition?: StagePoint;
    stepsPerMm?: StagePoint;
}

export interface ScriptedFault {
    /** Command prefix the fault applies to, e.g. "G1" */
    match: string;
    /** Lines sent instead of the normal reply; an empty list means silence */
    reply: string[];
}

type DataListener = (chunk: Uint8Array) => void;
type CloseListener = (error?: Error) => void;

const DEFAULT_STEPS_PER_MM: StagePoint = { x: 80, y: 80, z: 400 };

const MOVE_WORD_REGEX = /([XYZF])\s*(-?\d+(?:\.\d+)?)/gi;

const encoder = new TextEncoder();

/**
 * In-process G-code controller: acknowledges moves, reports positions and
 * fragments every reply. Used for dummy runs and tests.
 */
export class SimulatedStageController implements ByteStream {
    private readonly dataListeners = new Set<DataListener>();

    private readonly closeListeners = new Set<CloseListener>();

    private readonly fragmentSize: number;

    private readonly replyDelayMs: number;

    private readonly stepsPerMm: StagePoint;

    private readonly faults: ScriptedFault[] = [];

    private readonly received: string[] = [];

    private inputBuffer = '';

    private position: StagePoint;

    private open = true;

    private lastFeedrate = 0;

    constructor(options: SimulatedStageOptions = {}) {
        this.fragmentSize = Math.max(1, options.fragmentSize ?? 7);
        this.replyDelayMs = options.replyDelayMs ?? 0;
        this.position = { ...(options.initialPosition ?? { x: 0, y: 0, z: 0 }) };
        this.stepsPerMm = options.stepsPerMm ?? DEFAULT_STEPS_PER_MM;
    }

    /** Every command line received so far. */
    public get commands(): readonly string[] {
        return this.received;
    }

    public get currentPosition(): StagePoint {
        return { ...this.position };
    }

    public get feedrate(): number {
        return this.lastFeedrate;
    }

    public get isOpen(): boolean {
        return this.open;
    }

    /** Replace the reply to the next command starting with `match`. */
    public queueFault(fault: ScriptedFault): void {
        this.faults.push(fault);
    }

    /** Push unsolicited bytes, e.g. a boot banner or line noise. */
    public emitRaw(data: Uint8Array | string): void {
        const bytes = typeof data === 'string' ? encoder.encode(data) : data;
        this.dataListeners.forEach((listener) => listener(bytes));
    }

    /** Simulate the cable being pulled. */
    public disconnect(error: Error = new Error('Port disconnected')): void {
        if (!this.open) {
            return;
        }
        this.open = false;
        this.closeListeners.forEach((listener) => listener(error));
    }

    public async write(data: string): Promise<void> {
        if (!this.open) {
            throw new Error('Port is not open');
        }
        this.inputBuffer += data;
        let newline = this.inputBuffer.indexOf('\n');
        while (newline !== -1) {
            const command = this.inputBuffer.slice(0, newline).trim();
            this.inputBuffer = this.inputBuffer.slice(newline + 1);
            if (command.length > 0) {
                this.received.push(command);
                this.scheduleReply(this.respond(command));
            }
            newline = this.inputBuffer.indexOf('\n');
        }
    }

    public onData(listener: DataListener): () => void {
        this.dataListeners.add(listener);
        return () => this.dataListeners.delete(listener);
    }

    public onClose(listener: CloseListener): () => void {
        this.closeListeners.add(listener);
        return () => this.closeListeners.delete(listener);
    }

    public async close(): Promise<void> {
        if (!this.open) {
            return;
        }
        this.open = false;
        this.closeListeners.forEach((listener) => listener());
    }

    private respond(command: string): string[] {
        const faultIndex = this.faults.findIndex((fault) =>
            command.toUpperCase().startsWith(fault.match.toUpperCase()),
        );
        if (faultIndex !== -1) {
            const [fault] = this.faults.splice(faultIndex, 1);
            return fault.reply;
        }

        const [word] = command.toUpperCase().split(/\s+/);
        switch (word) {
            case 'G0':
            case 'G1':
                this.applyMove(command);
                return ['ok'];
            case 'G28':
                this.position = { x: 0, y: 0, z: 0 };
                return ['ok'];
            case 'M114':
                return [this.formatPosition(), 'ok'];
            case 'M400':
                return ['ok'];
            default:
                return [`echo:Unknown command: "${command}"`, 'ok'];
        }
    }

    private applyMove(command: string): void {
        for (const match of command.matchAll(MOVE_WORD_REGEX)) {
            const value = Number.parseFloat(match[2]);
            switch (match[1].toUpperCase()) {
                case 'X':
                    this.position.x = value;
                    break;
                case 'Y':
                    this.position.y = value;
                    break;
                case 'Z':
                    this.position.z = value;
                    break;
                default:
                    this.lastFeedrate = value;
            }
        }
    }

    private formatPosition(): string {
        const { x, y, z } = this.position;
        const steps = (value: number, perMm: number) => Math.round(value * perMm);
        return (
            `X:${x.toFixed(2)} Y:${y.toFixed(2)} Z:${z.toFixed(2)} E:0.00 ` +
            `Count X:${steps(x, this.stepsPerMm.x)} Y:${steps(y, this.stepsPerMm.y)} Z:${steps(z, this.stepsPerMm.z)}`
        );
    }

    private scheduleReply(lines: string[]): void {
        if (lines.length === 0) {
            return;
        }
        const bytes = encoder.encode(lines.map((line) => `${line}\r\n`).join(''));
        setTimeout(() => {
            if (!this.open) {
                return;
            }
            for (let offset = 0; offset < bytes.length; offset += this.fragmentSize) {
                const chunk = bytes.subarray(offset, offset + this.fragmentSize);
                this.dataListeners.forEach((listener) => listener(chunk));
            }
        }, this.replyDelayMs);
    }
}
