/**
 * Socket Transport
 *
 * Wraps a connected net.Socket as a Transport. TCP and Unix domain sockets
 * share all of the byte-level behaviour; they differ only in how the
 * socket is opened (see tcp.ts and unix-socket.ts).
 */

import * as net from "node:net";
import { ConnectionError, toError } from "../errors.js";
import type { EndHandler, Transport } from "./types.js";

export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;

export class SocketTransport implements Transport {
    private readonly socket: net.Socket;
    readonly target: string;
    private receiving = false;
    private ended = false;
    private lastError: Error | undefined;
    private endHandler: EndHandler | undefined;

    constructor(socket: net.Socket, target: string) {
        this.socket = socket;
        this.target = target;

        // Attached up front so a reset before startReceiving() can't crash the process
        socket.on("error", (err) => {
            this.lastError = err;
        });
        socket.on("close", () => this.finish());
    }

    get connected(): boolean {
        return !this.socket.destroyed && !this.ended;
    }

    send(data: string): boolean {
        if (!this.connected) return false;
        try {
            this.socket.write(data, "utf8");
            return true;
        } catch (err) {
            this.lastError = toError(err);
            return false;
        }
    }

    startReceiving(onData: (chunk: Buffer | string) => void, onEnd?: EndHandler): void {
        if (this.receiving) return;
        this.receiving = true;
        this.endHandler = onEnd;

        if (this.ended) {
            this.finish();
            return;
        }

        this.socket.on("data", (chunk: Buffer) => {
            if (chunk.length > 0) onData(chunk);
        });
    }

    close(): void {
        if (this.socket.destroyed) return;
        this.socket.destroy();
    }

    private finish(): void {
        this.ended = true;
        const handler = this.endHandler;
        if (!handler) return;
        this.endHandler = undefined;
        handler(this.lastError);
    }
}

/**
 * Open a socket and resolve once it is connected. Rejects with a
 * ConnectionError on failure or after `timeoutMs`.
 */
export function openSocket(
    options: net.NetConnectOpts,
    target: string,
    timeoutMs: number,
): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
        const socket = net.createConnection(options);

        const fail = (err: Error) => {
            socket.destroy();
            reject(new ConnectionError(target, err));
        };

        socket.setTimeout(timeoutMs, () => fail(new Error(`timed out after ${timeoutMs}ms`)));
        socket.once("error", fail);
        socket.once("connect", () => {
            socket.setTimeout(0);
            socket.removeListener("error", fail);
            resolve(socket);
        });
    });
}
