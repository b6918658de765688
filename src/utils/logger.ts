/**
 * Structured logger shared by the library, the CLI and the MCP server.
 *
 * All output goes to stderr, never stdout: the MCP server speaks JSON-RPC
 * on stdout and the CLI prints command results there.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogData = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function levelFromEnv(): LogLevel {
    const raw = process.env['LOG_LEVEL']?.trim().toLowerCase();
    return isLogLevel(raw) ? raw : 'info';
}

let currentLevel: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function formatMessage(level: LogLevel, scope: string | undefined, message: string, data?: LogData): string {
    const timestamp = new Date().toISOString();
    const tag = scope ? ` [${scope}]` : '';
    const base = `[${timestamp}] [${level.toUpperCase()}]${tag} ${message}`;
    if (data && Object.keys(data).length > 0) {
        return `${base} ${JSON.stringify(data)}`;
    }
    return base;
}

export interface Logger {
    debug(message: string, data?: LogData): void;
    info(message: string, data?: LogData): void;
    warn(message: string, data?: LogData): void;
    error(message: string, data?: LogData): void;
}

function write(level: Exclude<LogLevel, 'silent'>, scope: string | undefined, message: string, data?: LogData): void {
    if (shouldLog(level)) {
        process.stderr.write(formatMessage(level, scope, message, data) + '\n');
    }
}

/**
 * Logger whose lines carry a `[scope]` tag after the level,
 * e.g. `[2025-01-01T00:00:00.000Z] [WARN] [hooks] ...`.
 */
export function createLogger(scope?: string): Logger {
    return {
        debug: (message, data) => write('debug', scope, message, data),
        info: (message, data) => write('info', scope, message, data),
        warn: (message, data) => write('warn', scope, message, data),
        error: (message, data) => write('error', scope, message, data),
    };
}

export const logger: Logger = createLogger();

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
