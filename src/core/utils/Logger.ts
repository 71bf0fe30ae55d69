export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Lowest level mirrored to the console; `silent` mirrors nothing. */
export type ConsoleLevel = LogLevel | 'silent';

export interface LogEntry {
    timestamp: number;
    level: LogLevel;
    message: string;
    data?: unknown;
}

type LogListener = (entry: LogEntry) => void;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * App-wide log bus. Every entry reaches the subscribers (the in-app log viewer);
 * the console only gets entries at or above the configured level.
 */
export class LoggerService {
    private listeners: LogListener[] = [];

    constructor(private consoleLevel: ConsoleLevel = 'debug') { }

    public subscribe(listener: LogListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    public setConsoleLevel(level: ConsoleLevel) {
        this.consoleLevel = level;
    }

    private emit(level: LogLevel, message: string, data?: unknown) {
        const entry: LogEntry = {
            timestamp: Date.now(),
            level,
            message,
            data
        };
        if (this.consoleLevel !== 'silent' && LEVEL_ORDER[level] >= LEVEL_ORDER[this.consoleLevel]) {
            console[level](`[${level.toUpperCase()}] ${message}`, data ?? '');
        }

        this.listeners.forEach(l => l(entry));
    }

    public info(msg: string, data?: unknown) { this.emit('info', msg, data); }
    public warn(msg: string, data?: unknown) { this.emit('warn', msg, data); }
    public error(msg: string, data?: unknown) { this.emit('error', msg, data); }
    public debug(msg: string, data?: unknown) { this.emit('debug', msg, data); }
}

function defaultConsoleLevel(): ConsoleLevel {
    if (import.meta.env.MODE === 'test') return 'silent';
    return import.meta.env.DEV ? 'debug' : 'info';
}

export const Logger = new LoggerService(defaultConsoleLevel());
