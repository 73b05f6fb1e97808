#!/usr/bin/env node
/**
 * chess-client: connect to a chess server and play from the terminal.
 *
 * Exit codes: 0 normal quit, 1 connection or session failure,
 * 2 bad configuration.
 */

import { ChessClient } from "./client.js";
import { loadConfig, USAGE, type LoadedConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { createLogger } from "./logger.js";
import { ConsoleView } from "./views/console.js";

async function main(): Promise<number> {
    let loaded: LoadedConfig;
    try {
        loaded = loadConfig();
    } catch (err) {
        if (err instanceof ConfigError) {
            process.stderr.write(`${err.message}\n\n${USAGE}\n`);
            return 2;
        }
        throw err;
    }

    if (loaded.help) {
        process.stdout.write(`${USAGE}\n`);
        return 0;
    }

    const { config } = loaded;
    const logger = createLogger({ level: config.logLevel, file: config.logFile });
    const client = new ChessClient({
        target: config,
        view: new ConsoleView(),
        gameFile: config.gameFile,
        logger,
    });

    process.once("SIGINT", () => {
        logger.info("Interrupted, shutting down");
        client.stop();
        process.exit(130);
    });

    return client.run();
}

main().then(
    (code) => {
        process.exitCode = code;
    },
    (err: unknown) => {
        process.stderr.write(`Fatal error: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
        process.exitCode = 1;
    },
);
