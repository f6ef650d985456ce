/**
 * Diagnostic sink for the kernel.
 *
 * Geometry functions never print. Where a function falls back on degenerate
 * input it reports through an optional `Logger`; the default discards everything.
 * The console logger writes to stderr only, since stdout carries the MCP transport.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface Logger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

export const silentLogger: Logger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
};

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && Object.hasOwn(LEVEL_RANK, value);
}

/**
 * Reads a log level name, falling back to `info` for anything unrecognized.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
    const normalized = value?.trim().toLowerCase();
    return isLogLevel(normalized) ? normalized : 'info';
}

/**
 * Formats a single log line: `[LEVEL] [category] message {context}`.
 */
export function formatLogLine(level: Exclude<LogLevel, 'silent'>, category: string, message: string, context?: LogContext): string {
    const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    return `[${level.toUpperCase()}] [${category}] ${message}${suffix}`;
}

/**
 * Creates a logger that forwards lines at or above `level` to `write`.
 *
 * @param level Minimum level to emit.
 * @param category Tag prefixed to every line (e.g. "GEOMETRY").
 * @param write Line sink; defaults to `console.error`.
 */
export function createConsoleLogger(
    level: LogLevel,
    category: string = 'GEOMETRY',
    write: (line: string) => void = (line) => console.error(line),
): Logger {
    const emit = (lineLevel: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext) => {
        if (LEVEL_RANK[lineLevel] >= LEVEL_RANK[level]) {
            write(formatLogLine(lineLevel, category, message, context));
        }
    };

    return {
        debug: (message, context) => emit('debug', message, context),
        info: (message, context) => emit('info', message, context),
        warn: (message, context) => emit('warn', message, context),
        error: (message, context) => emit('error', message, context),
    };
}
