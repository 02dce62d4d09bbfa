export type LogSeverity = 'debug' | 'info' | 'warning' | 'error';

export interface LogEntry {
    id: string;
    scope: string;
    severity: LogSeverity;
    message: string;
    timestamp: number;
    metadata?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
    readonly scope: string;
    debug: (message: string, metadata?: Record<string, unknown>) => void;
    info: (message: string, metadata?: Record<string, unknown>) => void;
    warning: (message: string, metadata?: Record<string, unknown>) => void;
    error: (message: string, metadata?: Record<string, unknown>) => void;
}

export interface LoggingConfig {
    level?: LogSeverity;
    sink?: LogSink;
}

export interface MemoryLogSink {
    sink: LogSink;
    /** Newest first. */
    readonly entries: readonly LogEntry[];
    clear: () => void;
}

const SEVERITY_RANK: Record<LogSeverity, number> = {
    debug: 10,
    info: 20,
    warning: 30,
    error: 40,
};

export const LOG_LEVEL_ENV = 'TILE_MAP_LOG_LEVEL';

const MAX_LOG_ENTRIES = 200;

export const isLogSeverity = (value: unknown): value is LogSeverity =>
    typeof value === 'string' && Object.hasOwn(SEVERITY_RANK, value);

const levelFromEnv = (): LogSeverity => {
    const raw = process.env[LOG_LEVEL_ENV]?.trim().toLowerCase();
    return isLogSeverity(raw) ? raw : 'info';
};

const createLogId = (() => {
    let counter = 0;
    return () => {
        counter += 1;
        return `log-${Date.now()}-${counter}`;
    };
})();

const formatEntry = (entry: LogEntry): string =>
    `${new Date(entry.timestamp).toISOString()} [${entry.severity.toUpperCase()}] ${entry.scope}: ${entry.message}`;

export const consoleLogSink: LogSink = (entry) => {
    const line = formatEntry(entry);
    const args: unknown[] = entry.metadata ? [line, entry.metadata] : [line];
    switch (entry.severity) {
        case 'debug':
            console.debug(...args);
            break;
        case 'info':
            console.info(...args);
            break;
        case 'warning':
            console.warn(...args);
            break;
        case 'error':
            console.error(...args);
            break;
        default:
            entry.severity satisfies never;
    }
};

const state: { level: LogSeverity; sink: LogSink } = {
    level: levelFromEnv(),
    sink: consoleLogSink,
};

/** Replaces the process-wide minimum level and/or sink. Returns the previous settings. */
export const configureLogging = (config: LoggingConfig): Required<LoggingConfig> => {
    const previous = { level: state.level, sink: state.sink };
    if (config.level) {
        state.level = config.level;
    }
    if (config.sink) {
        state.sink = config.sink;
    }
    return previous;
};

export const createMemoryLogSink = (maxEntries = MAX_LOG_ENTRIES): MemoryLogSink => {
    let entries: LogEntry[] = [];
    return {
        sink: (entry) => {
            entries = [entry, ...entries].slice(0, maxEntries);
        },
        get entries() {
            return entries;
        },
        clear: () => {
            entries = [];
        },
    };
};

export const createLogger = (scope: string): Logger => {
    const append = (severity: LogSeverity, message: string, metadata?: Record<string, unknown>) => {
        if (SEVERITY_RANK[severity] < SEVERITY_RANK[state.level]) {
            return;
        }
        state.sink({
            id: createLogId(),
            scope,
            severity,
            message,
            metadata,
            timestamp: Date.now(),
        });
    };
    return {
        scope,
        debug: (message, metadata) => append('debug', message, metadata),
        info: (message, metadata) => append('info', message, metadata),
        warning: (message, metadata) => append('warning', message, metadata),
        error: (message, metadata) => append('error', message, metadata),
    };
};
