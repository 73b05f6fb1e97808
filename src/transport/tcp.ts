/**
 * TCP Transport
 *
 * A SocketTransport connected to a remote host:port.
 */

import type * as net from "node:net";
import { DEFAULT_CONNECT_TIMEOUT_MS, SocketTransport, openSocket } from "./socket.js";

export class TcpTransport extends SocketTransport {
    readonly host: string;
    readonly port: number;

    constructor(socket: net.Socket, host: string, port: number) {
        super(socket, `${host}:${port}`);
        this.host = host;
        this.port = port;
    }
}

/**
 * Create a TcpTransport by connecting to host:port.
 * Resolves when the connection is established.
 */
export async function connectTcp(
    host: string,
    port: number,
    timeoutMs: number = DEFAULT_CONNECT_TIMEOUT_MS,
): Promise<TcpTransport> {
    const socket = await openSocket({ host, port }, `${host}:${port}`, timeoutMs);
    socket.setNoDelay(true);
    return new TcpTransport(socket, host, port);
}
