export type LogSeverity = 'info' | 'warning' | 'error';

export interface LogEntry {
    id: string;
    scope: string;
    severity: LogSeverity;
    message: string;
    timestamp: number;
    metadata?: Record<string, unknown>;
}

interface AppendLogParams {
    scope: string;
    severity: LogSeverity;
    message: string;
    metadata?: Record<string, unknown>;
    timestamp?: number;
}

/** Narrow logging surface the services depend on. */
export interface Logger {
    logInfo: (scope: string, message: string, metadata?: Record<string, unknown>) => void;
    logWarning: (scope: string, message: string, metadata?: Record<string, unknown>) => void;
    logError: (scope: string, message: string, metadata?: Record<string, unknown>) => void;
}

type LogListener = (entry: LogEntry) => void;

export type ConsoleSink = Pick<Console, 'info' | 'warn' | 'error'>;

interface LogStoreOptions {
    maxEntries?: number;
    /** Mirror entries to a console; omitted means the store only keeps them in memory */
    console?: ConsoleSink;
}

const MAX_LOG_ENTRIES = 200;

const createLogId = (() => {
    let counter = 0;
    return () => {
        counter += 1;
        return `log-${Date.now()}-${counter}`;
    };
})();

export class LogStore implements Logger {
    private entries: LogEntry[] = [];

    private readonly listeners = new Set<LogListener>();

    private readonly maxEntries: number;

    private readonly sink: ConsoleSink | null;

    constructor(options: LogStoreOptions = {}) {
        this.maxEntries = options.maxEntries ?? MAX_LOG_ENTRIES;
        this.sink = options.console ?? null;
    }

    /** Newest entry first. */
    public getEntries(): readonly LogEntry[] {
        return this.entries;
    }

    public subscribe(listener: LogListener): () => void {
        this.listeners.add(listener);
        return () => this.listeners.delete(listener);
    }

    public append(entry: AppendLogParams): LogEntry {
        const nextEntry: LogEntry = {
            id: createLogId(),
            scope: entry.scope,
            severity: entry.severity,
            message: entry.message,
            metadata: entry.metadata,
            timestamp: entry.timestamp ?? Date.now(),
        };
        this.entries = [nextEntry, ...this.entries].slice(0, this.maxEntries);
        this.writeToSink(nextEntry);
        this.listeners.forEach((listener) => listener(nextEntry));
        return nextEntry;
    }

    public clear(): void {
        this.entries = [];
    }

    public logInfo = (scope: string, message: string, metadata?: Record<string, unknown>): void => {
        this.append({ severity: 'info', scope, message, metadata });
    };

    public logWarning = (scope: string, message: string, metadata?: Record<string, unknown>): void => {
        this.append({ severity: 'warning', scope, message, metadata });
    };

    public logError = (scope: string, message: string, metadata?: Record<string, unknown>): void => {
        this.append({ severity: 'error', scope, message, metadata });
    };

    private writeToSink(entry: LogEntry): void {
        if (!this.sink) {
            return;
        }
        const line = `[${entry.scope}] ${entry.message}`;
        const args: unknown[] = entry.metadata ? [line, entry.metadata] : [line];
        if (entry.severity === 'error') {
            this.sink.error(...args);
        } else if (entry.severity === 'warning') {
            this.sink.warn(...args);
        } else {
            this.sink.info(...args);
        }
    }
}

const noop = (): void => {};

export const silentLogger: Logger = {
    logInfo: noop,
    logWarning: noop,
    logError: noop,
};

export const createConsoleLogStore = (): LogStore => new LogStore({ console });
