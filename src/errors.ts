/**
 * Error types for the chess client.
 *
 * The core never lets these escape a public operation: sessions and
 * transports report failure through return values and log the error.
 * They are thrown only at the edges (connect, config loading) where the
 * caller decides how to report and exit.
 */

export type ChessClientErrorCode =
    | "connection_failed"
    | "invalid_config"
    | "message_too_large";

export class ChessClientError extends Error {
    readonly code: ChessClientErrorCode;

    constructor(code: ChessClientErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** The transport could not be established. */
export class ConnectionError extends ChessClientError {
    readonly target: string;

    constructor(target: string, cause?: unknown) {
        const reason = cause instanceof Error ? cause.message : "unknown error";
        super("connection_failed", `Failed to connect to ${target}: ${reason}`, { cause });
        this.target = target;
    }
}

export class ConfigError extends ChessClientError {
    readonly problems: string[];

    constructor(problems: string[]) {
        super("invalid_config", `Invalid configuration: ${problems.join("; ")}`);
        this.problems = problems;
    }
}

/** A line grew past the framer's limit without a newline. */
export class FramingError extends ChessClientError {
    readonly size: number;
    readonly limit: number;

    constructor(size: number, limit: number) {
        super("message_too_large", `Message size ${size} exceeds maximum ${limit}`);
        this.size = size;
        this.limit = limit;
    }
}

export function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}
