import util from "util";

const ENABLE_DEBUG_LOGS = process.env.OUTLINE_DEBUG === "true";
const ENV_LOG_LEVEL = (process.env.OUTLINE_LOG_LEVEL ?? "").toLowerCase();

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
    debug(message: string, fields?: Record<string, unknown>): void;
    info(message: string, fields?: Record<string, unknown>): void;
    warn(message: string, fields?: Record<string, unknown>): void;
    error(message: string, fields?: Record<string, unknown>): void;
}

const levelPriority: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

let runtimeLevel: LogLevel | undefined;

function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(levelPriority, value);
}

function resolveLevel(): LogLevel {
    if (runtimeLevel) return runtimeLevel;
    if (ENV_LOG_LEVEL && isLogLevel(ENV_LOG_LEVEL)) return ENV_LOG_LEVEL;
    return ENABLE_DEBUG_LOGS ? "debug" : "info";
}

/**
 * Overrides the env-derived level for every logger, e.g. for `--verbose`.
 * Passing `undefined` restores the env default.
 */
export function setLogLevel(level: LogLevel | undefined): void {
    runtimeLevel = level;
}

export function getLogLevel(): LogLevel {
    return resolveLevel();
}

export function createLogger(component: string): Logger {
    const log = (level: Exclude<LogLevel, "silent">, message: string, fields?: Record<string, unknown>) => {
        if (levelPriority[level] < levelPriority[resolveLevel()]) {
            return;
        }
        const payload = {
            timestamp: new Date().toISOString(),
            level,
            component,
            message,
            ...(fields ?? {})
        };
        // stdout carries MCP frames and CLI JSON; logs always go to stderr.
        process.stderr.write(`${JSON.stringify(payload)}\n`);
    };

    return {
        debug: (message, fields) => log("debug", message, fields),
        info: (message, fields) => log("info", message, fields),
        warn: (message, fields) => log("warn", message, fields),
        error: (message, fields) => log("error", message, fields)
    };
}

/**
 * Sends `console.log/info/debug` through a logger so stray output from libraries lands on stderr
 * as structured lines, filtered by the active level. stdout then carries only MCP frames.
 */
export function routeConsoleToLogger(component = "console"): void {
    const logger = createLogger(component);
    console.log = (...args: unknown[]) => logger.info(util.format(...args));
    console.info = (...args: unknown[]) => logger.info(util.format(...args));
    console.debug = (...args: unknown[]) => logger.debug(util.format(...args));
}
