import type { Transport } from "./types.js";
import { connectTcp } from "./tcp.js";
import { connectUnix } from "./unix-socket.js";

export type TransportKind = "tcp" | "unix";

export interface TransportTarget {
    transport: TransportKind;
    host: string;
    port: number;
    socketPath: string;
    connectTimeoutMs: number;
}

/** Connect the transport the configuration asks for. Rejects with a ConnectionError. */
export function createTransport(target: TransportTarget): Promise<Transport> {
    switch (target.transport) {
        case "tcp":
            return connectTcp(target.host, target.port, target.connectTimeoutMs);
        case "unix":
            return connectUnix(target.socketPath, target.connectTimeoutMs);
    }
}

export function describeTarget(target: TransportTarget): string {
    return target.transport === "unix"
        ? `Unix socket ${target.socketPath}`
        : `${target.host}:${target.port}`;
}
