/**
 * Client configuration
 *
 * Resolved from command-line flags, then CHESS_* environment variables,
 * then defaults, and validated as a whole so every problem is reported at
 * once.
 */

import { parseArgs } from "node:util";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError, toError } from "./errors.js";
import { describeProblems } from "./util.js";

export const ClientConfigSchema = Type.Object({
    transport: Type.Union([Type.Literal("tcp"), Type.Literal("unix")]),
    host: Type.String({ minLength: 1 }),
    port: Type.Integer({ minimum: 1, maximum: 65535 }),
    socketPath: Type.String({ minLength: 1 }),
    /** Game script to upload right after connecting */
    gameFile: Type.Optional(Type.String({ minLength: 1 })),
    connectTimeoutMs: Type.Integer({ minimum: 1 }),
    logLevel: Type.Union([
        Type.Literal("error"),
        Type.Literal("warn"),
        Type.Literal("info"),
        Type.Literal("debug"),
    ]),
    logFile: Type.Optional(Type.String({ minLength: 1 })),
});

export type ClientConfig = Static<typeof ClientConfigSchema>;

export const DEFAULT_CONFIG: ClientConfig = {
    transport: "tcp",
    host: "localhost",
    port: 2000,
    socketPath: "/tmp/chess_server.sock",
    connectTimeoutMs: 5000,
    logLevel: "info",
};

export const USAGE = `Usage: chess-client [options]

Options:
  --transport <tcp|unix>   Connection type (default: tcp)
  --host <host>            Server host for tcp (default: localhost)
  --port <port>            Server port for tcp (default: 2000)
  --socket <path>          Socket path for unix (default: /tmp/chess_server.sock)
  --file <path>            Upload and play a game file after connecting
  --timeout <ms>           Connection timeout (default: 5000)
  --log-level <level>      error | warn | info | debug (default: info)
  --log-file <path>        Also write logs to this file
  --help                   Show this help`;

export interface LoadedConfig {
    config: ClientConfig;
    help: boolean;
}

const FLAGS = {
    transport: { type: "string" },
    host: { type: "string" },
    port: { type: "string" },
    socket: { type: "string" },
    file: { type: "string" },
    timeout: { type: "string" },
    "log-level": { type: "string" },
    "log-file": { type: "string" },
    help: { type: "boolean" },
} as const;

function parseFlags(argv: string[]) {
    try {
        return parseArgs({ args: argv, options: FLAGS, strict: true, allowPositionals: false }).values;
    } catch (err) {
        throw new ConfigError([toError(err).message]);
    }
}

function toNumber(value: string | undefined): number | undefined {
    return value === undefined || value === "" ? undefined : Number(value);
}

/**
 * Build the configuration. Throws ConfigError on unknown flags or values
 * that fail validation.
 */
export function loadConfig(
    argv: string[] = process.argv.slice(2),
    env: NodeJS.ProcessEnv = process.env,
): LoadedConfig {
    const values = parseFlags(argv);

    const candidate: Record<string, unknown> = {
        transport: values.transport ?? env["CHESS_TRANSPORT"] ?? DEFAULT_CONFIG.transport,
        host: values.host ?? env["CHESS_HOST"] ?? DEFAULT_CONFIG.host,
        port: toNumber(values.port ?? env["CHESS_PORT"]) ?? DEFAULT_CONFIG.port,
        socketPath: values.socket ?? env["CHESS_SOCKET"] ?? DEFAULT_CONFIG.socketPath,
        connectTimeoutMs: toNumber(values.timeout ?? env["CHESS_TIMEOUT"]) ?? DEFAULT_CONFIG.connectTimeoutMs,
        logLevel: values["log-level"] ?? env["CHESS_LOG_LEVEL"] ?? DEFAULT_CONFIG.logLevel,
    };
    const gameFile = values.file ?? env["CHESS_GAME_FILE"];
    if (gameFile !== undefined) candidate["gameFile"] = gameFile;
    const logFile = values["log-file"] ?? env["CHESS_LOG_FILE"];
    if (logFile !== undefined) candidate["logFile"] = logFile;

    if (!Value.Check(ClientConfigSchema, candidate)) {
        throw new ConfigError(describeProblems(ClientConfigSchema, candidate));
    }
    return { config: candidate, help: values.help ?? false };
}
