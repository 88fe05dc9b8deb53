import pino from 'pino';
import type { LogLevel } from '../types/index.js';

const LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>(['error', 'warn', 'info', 'debug', 'silent']);

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 *
 * Everything is written to stderr: stdout is reserved for the report.
 * Never pass reference words to the logger, only counts.
 */
let loggerInstance: pino.Logger | null = null;

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.has(value);
}

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
    destination?: pino.DestinationStream;
}): pino.Logger {
    const { level = 'info', jsonLogs = false, destination } = options;

    if (destination) {
        loggerInstance = pino({ level }, destination);
    } else if (jsonLogs) {
        loggerInstance = pino({ level }, pino.destination(2));
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    destination: 2,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates a JSON logger whose level comes from
 * `WORDLIST_ORACLE_LOG_LEVEL` (default info).
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        const envLevel = process.env['WORDLIST_ORACLE_LOG_LEVEL'];
        const level = envLevel && isLogLevel(envLevel) ? envLevel : 'info';
        loggerInstance = initLogger({ level, jsonLogs: true });
    }
    return loggerInstance;
}

/**
 * Log a fatal error. Errors go under `err` so pino's serializer keeps
 * their message and stack.
 */
export function logFailure(error: unknown, msg: string): void {
    getLogger().error({ err: error }, msg);
}
