import { SerialPort } from 'serialport';

import {
    PORT_PROBE_BACKOFF_MS,
    PORT_PROBE_MAX_ATTEMPTS,
    SERIAL_BAUD_RATE,
} from '@/constants/control';
import { ConnectionError, NoPortFoundError } from '@/errors';
import { silentLogger } from '@/services/logStore';
import {
    MotionSession,
    type ByteStream,
    type MotionSessionParams,
} from '@/services/motion/motionSession';
import type { MotionLinkState } from '@/types';
import { delay, type Sleep } from '@/utils/time';

type PortInfo = Awaited<ReturnType<typeof SerialPort.list>>[number];

export interface PortCandidate {
    path: string;
    description: string;
}

export type PortLister = () => Promise<PortInfo[]>;

export type PortOpener = (path: string, baudRate: number) => Promise<ByteStream>;

const LOG_SCOPE = 'serial';

const USB_PATH_MARKERS = ['ttyUSB', 'ttyACM'];
const USB_DESCRIPTION_MARKERS = ['USB', 'SERIAL', 'CH340', 'FTDI', 'CP210'];
const EXCLUDED_PATH_MARKERS = ['ttyAMA0', 'ttyS0'];

const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);

/** Byte stream over a `serialport` connection. */
export class SerialByteStream implements ByteStream {
    private readonly port: SerialPort;

    private constructor(port: SerialPort) {
        this.port = port;
    }

    public static open(path: string, baudRate: number = SERIAL_BAUD_RATE): Promise<SerialByteStream> {
        const port = new SerialPort({ path, baudRate, autoOpen: false });
        return new Promise((resolve, reject) => {
            port.open((error) => {
                if (error) {
                    reject(new ConnectionError(`Unable to open ${path}: ${error.message}`, path, { cause: error }));
                    return;
                }
                resolve(new SerialByteStream(port));
            });
        });
    }

    public get path(): string {
        return this.port.path;
    }

    public write(data: string): Promise<void> {
        return new Promise((resolve, reject) => {
            this.port.write(data, 'utf8', (error) => {
                if (error) {
                    reject(error);
                    return;
                }
                this.port.drain((drainError) => {
                    if (drainError) {
                        reject(drainError);
                        return;
                    }
                    resolve();
                });
            });
        });
    }

    public onData(listener: (chunk: Uint8Array) => void): () => void {
        const handler = (chunk: Buffer) => listener(chunk);
        this.port.on('data', handler);
        return () => {
            this.port.off('data', handler);
        };
    }

    public onClose(listener: (error?: Error) => void): () => void {
        const handler = (error?: Error | null) => listener(error ?? undefined);
        this.port.on('close', handler);
        return () => {
            this.port.off('close', handler);
        };
    }

    public close(): Promise<void> {
        if (!this.port.isOpen) {
            return Promise.resolve();
        }
        return new Promise((resolve, reject) => {
            this.port.close((error) => {
                if (error) {
                    reject(error);
                    return;
                }
                resolve();
            });
        });
    }
}

export const describePort = (info: PortInfo): string =>
    [info.manufacturer, info.pnpId].filter((part): part is string => Boolean(part)).join(' ');

/** USB-to-serial adapters; Bluetooth and the on-board UARTs are excluded. */
export const isUsbSerialCandidate = (info: PortInfo): boolean => {
    const description = describePort(info).toUpperCase();
    const isUsbSerial =
        USB_PATH_MARKERS.some((marker) => info.path.includes(marker)) ||
        USB_DESCRIPTION_MARKERS.some((marker) => description.includes(marker));
    const excluded =
        description.includes('BLUETOOTH') ||
        EXCLUDED_PATH_MARKERS.some((marker) => info.path.includes(marker));
    return isUsbSerial && !excluded;
};

export const listCandidatePorts = async (
    lister: PortLister = () => SerialPort.list(),
): Promise<PortCandidate[]> => {
    const ports = await lister();
    return ports
        .filter(isUsbSerialCandidate)
        .map((info) => ({ path: info.path, description: describePort(info) }));
};

export interface ConnectMotionOptions extends Omit<MotionSessionParams, 'portPath'> {
    opener?: PortOpener;
    baudRate?: number;
    /** Open attempts on the selected port */
    maxAttempts?: number;
    backoffMs?: number;
    sleep?: Sleep;
    onStateChange?: (state: MotionLinkState) => void;
}

const defaultOpener: PortOpener = (path, baudRate) => SerialByteStream.open(path, baudRate);

/**
 * Pick the first candidate that opens cleanly, then open it for the session,
 * retrying with a fixed backoff while the controller boots.
 */
export const connectMotionSession = async (
    candidatePorts: readonly string[],
    options: ConnectMotionOptions = {},
): Promise<MotionSession> => {
    const {
        opener = defaultOpener,
        baudRate = SERIAL_BAUD_RATE,
        maxAttempts = PORT_PROBE_MAX_ATTEMPTS,
        backoffMs = PORT_PROBE_BACKOFF_MS,
        sleep = delay,
        onStateChange,
        ...sessionParams
    } = options;
    const logger = sessionParams.logger ?? silentLogger;

    const failed: Record<string, string> = {};
    let selected: string | null = null;
    for (const path of candidatePorts) {
        try {
            const probe = await opener(path, baudRate);
            await probe.close();
            selected = path;
            break;
        } catch (error) {
            failed[path] = errorMessage(error);
            logger.logWarning(LOG_SCOPE, `Probe failed on ${path}`, { error: failed[path] });
        }
    }
    if (selected === null) {
        onStateChange?.({ status: 'disconnected', portPath: null, lastError: 'No serial port found' });
        throw new NoPortFoundError(failed);
    }

    onStateChange?.({ status: 'connecting', portPath: selected });
    const attempts = Math.max(1, Math.floor(maxAttempts));
    for (let attempt = 1; ; attempt += 1) {
        try {
            const stream = await opener(selected, baudRate);
            const session = new MotionSession(stream, { ...sessionParams, portPath: selected });
            if (onStateChange) {
                session.onStateChange(onStateChange);
            }
            logger.logInfo(LOG_SCOPE, `Connected to ${selected}`, { baudRate, attempt });
            return session;
        } catch (error) {
            if (attempt >= attempts) {
                const message = errorMessage(error);
                onStateChange?.({ status: 'disconnected', portPath: selected, lastError: message });
                throw new ConnectionError(
                    `Failed to open ${selected} after ${attempts} attempts: ${message}`,
                    selected,
                    { cause: error },
                );
            }
            logger.logWarning(LOG_SCOPE, `Waiting for ${selected} (attempt ${attempt}/${attempts})`, {
                error: errorMessage(error),
            });
            await sleep(backoffMs);
        }
    }
};
