/**
 * Game file upload
 *
 * Sends a game script to the server as a series of `upload_game` commands.
 * The session does not couple requests to replies, so chunks are paced
 * with a fixed delay instead of waiting for acknowledgements.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import type { CommandSender } from "./controller.js";
import { defaultLogger, type ClientLogger } from "./logger.js";
import { toError } from "./errors.js";

export const DEFAULT_CHUNK_SIZE = 4096;
export const DEFAULT_CHUNK_DELAY_MS = 10;

export interface UploadOptions {
    /** Characters per chunk. Default: 4096. */
    chunkSize?: number;
    /** Pause after each chunk. Default: 10ms. */
    delayMs?: number;
    logger?: ClientLogger;
}

export interface UploadResult {
    ok: boolean;
    filename: string;
    chunksSent: number;
    chunksTotal: number;
    error?: string;
}

/** Split text into consecutive pieces of at most `size` characters. */
export function splitChunks(text: string, size: number): string[] {
    const chunks: string[] = [];
    for (let i = 0; i < text.length; i += size) {
        chunks.push(text.slice(i, i + size));
    }
    return chunks;
}

export async function uploadGameFile(
    filePath: string,
    sender: CommandSender,
    options: UploadOptions = {},
): Promise<UploadResult> {
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    const delayMs = options.delayMs ?? DEFAULT_CHUNK_DELAY_MS;
    const logger = options.logger ?? defaultLogger;
    const filename = path.basename(filePath);

    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
        return { ok: false, filename, chunksSent: 0, chunksTotal: 0, error: `Invalid chunk size: ${chunkSize}` };
    }

    let content: string;
    try {
        content = await fs.readFile(filePath, "utf-8");
    } catch (err) {
        const error = toError(err).message;
        logger.error(`Error reading game file: ${error}`, { file: filePath });
        return { ok: false, filename, chunksSent: 0, chunksTotal: 0, error };
    }

    const chunks = splitChunks(content, chunkSize);
    const totalSize = Buffer.byteLength(content, "utf-8");
    if (chunks.length === 0) {
        logger.warn("Game file is empty", { file: filePath });
        return { ok: false, filename, chunksSent: 0, chunksTotal: 0, error: "Game file is empty" };
    }

    logger.info(`Uploading ${filename} (${totalSize} bytes)`);

    let sent = 0;
    for (const [i, data] of chunks.entries()) {
        const current = i + 1;
        const ok = sender.send({
            command: "upload_game",
            metadata: {
                filename,
                total_size: totalSize,
                chunks_total: chunks.length,
                chunk_current: current,
            },
            data,
        });
        if (!ok) {
            logger.error(`Failed to send chunk ${current}`);
            return { ok: false, filename, chunksSent: sent, chunksTotal: chunks.length, error: `Failed to send chunk ${current}` };
        }
        sent = current;

        if (current % 10 === 0 || current === chunks.length) {
            logger.info(`Upload: ${Math.floor((current * 100) / chunks.length)}%`);
        }
        if (delayMs > 0) {
            await sleep(delayMs);
        }
    }

    logger.info(`Upload complete: ${filename}`);
    return { ok: true, filename, chunksSent: sent, chunksTotal: chunks.length };
}
