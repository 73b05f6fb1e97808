/**
 * Unix Socket Transport
 *
 * A SocketTransport connected to a local stream socket by filesystem path.
 */

import type * as net from "node:net";
import { DEFAULT_CONNECT_TIMEOUT_MS, SocketTransport, openSocket } from "./socket.js";

export class UnixTransport extends SocketTransport {
    readonly socketPath: string;

    constructor(socket: net.Socket, socketPath: string) {
        super(socket, socketPath);
        this.socketPath = socketPath;
    }
}

/**
 * Create a UnixTransport by connecting to a Unix socket path.
 * Resolves when the connection is established.
 */
export async function connectUnix(
    socketPath: string,
    timeoutMs: number = DEFAULT_CONNECT_TIMEOUT_MS,
): Promise<UnixTransport> {
    const socket = await openSocket({ path: socketPath }, socketPath, timeoutMs);
    return new UnixTransport(socket, socketPath);
}
