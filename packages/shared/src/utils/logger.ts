import winston from "winston";

const { combine, timestamp, printf, colorize, errors } = winston.format;

export const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

// Common aliases from other logging setups
const LEVEL_ALIASES: Record<string, LogLevel> = {
    warning: "warn",
    critical: "error",
    fatal: "error",
    trace: "silly",
};

/** Case-insensitive level name or alias, null when it names no winston level. */
export function parseLogLevel(raw: string): LogLevel | null {
    const name = raw.trim().toLowerCase();
    const level = LEVEL_ALIASES[name] ?? name;
    return LOG_LEVELS.find((known) => known === level) ?? null;
}

// Color codes for different elements
const colors = {
    reset: "\x1b[0m",
    dim: "\x1b[2m",
    cyan: "\x1b[36m",
    yellow: "\x1b[33m",
    green: "\x1b[32m",
    red: "\x1b[31m",
    magenta: "\x1b[35m",
    white: "\x1b[37m",
    gray: "\x1b[90m",
};

// Never print these, whatever the caller passes in
const SECRET_KEYS = new Set(["apiKey", "apikey", "authorization", "password"]);

function formatValue(key: string, value: unknown): string {
    if (SECRET_KEYS.has(key)) {
        return `${colors.dim}***${colors.reset}`;
    }
    if (value === null || value === undefined) {
        return `${colors.dim}null${colors.reset}`;
    }
    if (typeof value === "number") {
        return `${colors.yellow}${value}${colors.reset}`;
    }
    if (typeof value === "boolean") {
        return value ? `${colors.green}true${colors.reset}` : `${colors.yellow}false${colors.reset}`;
    }
    if (typeof value === "string") {
        return `${colors.cyan}"${value}"${colors.reset}`;
    }
    if (value instanceof Error) {
        return `${colors.red}"${value.message}"${colors.reset}`;
    }
    if (typeof value === "object") {
        return `${colors.dim}${JSON.stringify(value)}${colors.reset}`;
    }
    return String(value);
}

function formatMeta(meta: object): string {
    const entries = Object.entries(meta);
    if (entries.length === 0) return "";
    const formatted = entries
        .map(([key, value]) => `${colors.gray}${key}${colors.reset}=${formatValue(key, value)}`)
        .join(" ");
    return ` ${formatted}`;
}

const prettyFormat = printf(({ level, message, timestamp, name, stack, ...meta }) => {
    const timeStr = `${colors.dim}${timestamp}${colors.reset}`;
    const nameStr = name ? `${colors.magenta}[${name}]${colors.reset} ` : "";
    const msgStr = `${colors.white}${message}${colors.reset}`;
    const metaStr = formatMeta(meta);
    const stackStr = typeof stack === "string" ? `\n${colors.dim}${stack}${colors.reset}` : "";
    return `${timeStr} ${level} ${nameStr}${msgStr}${metaStr}${stackStr}`;
});

// Base logger configuration
export const logger = winston.createLogger({
    // Until config is validated an unusable LOG_LEVEL must not mute startup errors
    level: parseLogLevel(process.env.LOG_LEVEL ?? "") ?? "info",
    format: combine(
        errors({ stack: true }),
        timestamp({ format: "HH:mm:ss" })
    ),
    transports: [
        new winston.transports.Console({
            format: combine(
                colorize({ level: true }),
                prettyFormat
            ),
        }),
    ],
});

/**
 * Apply the configured verbosity. Named loggers created earlier follow it,
 * since winston children read the level from their parent.
 */
export function setLogLevel(level: LogLevel): void {
    logger.level = level;
}

/**
 * Logger interface that matches Pino's API signature:
 * logger.info({...meta}, "message") or logger.info("message")
 */
export interface Logger {
    info(message: string): void;
    info(meta: object, message: string): void;
    debug(message: string): void;
    debug(meta: object, message: string): void;
    warn(message: string): void;
    warn(meta: object, message: string): void;
    error(message: string): void;
    error(meta: object, message: string): void;
    child(meta: object): Logger;
}

function createPinoCompatibleLogger(winstonLogger: winston.Logger): Logger {
    const createLogMethod = (level: LogLevel) => {
        return (arg1: string | object, arg2?: string): void => {
            if (typeof arg1 === "string") {
                winstonLogger.log(level, arg1);
            } else if (typeof arg2 === "string") {
                winstonLogger.log(level, arg2, arg1);
            }
        };
    };
    return {
        info: createLogMethod("info"),
        debug: createLogMethod("debug"),
        warn: createLogMethod("warn"),
        error: createLogMethod("error"),
        child: (meta: object): Logger => {
            return createPinoCompatibleLogger(winstonLogger.child(meta));
        },
    };
}

/**
 * Create a named logger instance (child logger with name metadata)
 */
export const createLogger = (name: string): Logger => {
    return createPinoCompatibleLogger(logger).child({ name });
};
