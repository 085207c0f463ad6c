import { format } from "node:util";

export type LogLevel = "info" | "warn" | "error";

export interface LogEntry {
    id: number;
    timestamp: string;
    level: LogLevel;
    source: string;
    message: string;
}

export interface Logger {
    info(...args: unknown[]): void;
    warn(...args: unknown[]): void;
    error(...args: unknown[]): void;
}

const MAX_LOG_ENTRIES = 2000;
const DEFAULT_LIMIT = 200;

const entries: LogEntry[] = [];
let nextId = 1;

export function addLog(level: LogLevel, message: string, source = "app"): void {
    entries.push({
        id: nextId++,
        timestamp: new Date().toISOString(),
        level,
        source,
        message,
    });

    if (entries.length > MAX_LOG_ENTRIES) {
        entries.splice(0, entries.length - MAX_LOG_ENTRIES);
    }
}

export function getLogs(options?: {
    limit?: number;
    sinceId?: number;
    level?: LogLevel;
    source?: string;
}): LogEntry[] {
    const limit = options?.limit ?? DEFAULT_LIMIT;
    const sinceId = options?.sinceId;

    const filtered = entries.filter(
        (entry) =>
            (sinceId === undefined || entry.id > sinceId) &&
            (options?.level === undefined || entry.level === options.level) &&
            (options?.source === undefined || entry.source === options.source)
    );

    if (filtered.length <= limit) {
        return filtered;
    }

    return filtered.slice(filtered.length - limit);
}

export function clearLogs(): void {
    entries.splice(0, entries.length);
}

/**
 * Logger bound to a source tag. Lines go to the console as `[source] message`
 * and into the in-process log buffer.
 */
export function createLogger(source: string): Logger {
    const emit = (
        level: LogLevel,
        write: (line: string) => void,
        args: unknown[]
    ): void => {
        const message = format(...args);
        addLog(level, message, source);
        write(`[${source}] ${message}`);
    };

    return {
        info: (...args) => emit("info", (line) => console.log(line), args),
        warn: (...args) => emit("warn", (line) => console.warn(line), args),
        error: (...args) => emit("error", (line) => console.error(line), args),
    };
}
