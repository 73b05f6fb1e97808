/**
 * Logging
 *
 * Console output goes to stderr so the menu and prompts on stdout stay
 * readable; an optional file transport keeps a JSON record of the run.
 */

import winston from "winston";

export type LogMeta = Record<string, unknown>;

export type LogLevel = "error" | "warn" | "info" | "debug";

/**
 * What the core needs from a logger. A winston Logger satisfies it, and
 * tests pass a recorder.
 */
export interface ClientLogger {
    error(message: string, meta?: LogMeta): unknown;
    warn(message: string, meta?: LogMeta): unknown;
    info(message: string, meta?: LogMeta): unknown;
    debug(message: string, meta?: LogMeta): unknown;
}

export interface LoggerOptions {
    level?: LogLevel;
    /** Write JSON lines to this file as well. Truncated on each run. */
    file?: string;
}

const consoleFormat = winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
        return `[${String(timestamp)}] ${level.toUpperCase()}: ${String(message)}${metaStr}`;
    }),
);

const fileFormat = winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
);

export function createLogger(options: LoggerOptions = {}): winston.Logger {
    const logger = winston.createLogger({
        level: options.level ?? "info",
        defaultMeta: { service: "chess-client" },
        transports: [
            new winston.transports.Console({
                format: consoleFormat,
                stderrLevels: ["error", "warn", "info", "debug"],
            }),
        ],
    });

    if (options.file) {
        logger.add(
            new winston.transports.File({
                filename: options.file,
                format: fileFormat,
                options: { flags: "w" },
            }),
        );
    }

    return logger;
}

/** Logger used when a component is built without one. */
export const defaultLogger: ClientLogger = createLogger({
    level: parseLevel(process.env["CHESS_LOG_LEVEL"]) ?? "warn",
});

export function parseLevel(value: string | undefined): LogLevel | undefined {
    switch (value) {
        case "error":
        case "warn":
        case "info":
        case "debug":
            return value;
        default:
            return undefined;
    }
}
