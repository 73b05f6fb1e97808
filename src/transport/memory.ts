/**
 * In-Memory Transport
 *
 * A pair of transports connected back-to-back for testing.
 * Write to one end, read from the other. Synchronous, no real I/O.
 *
 * **Synchronous delivery.** Unlike real sockets, where data arrives on a
 * later event-loop tick, send() invokes the peer's data handler before it
 * returns. Data sent before the peer calls startReceiving() is queued and
 * flushed when it does, matching a paused socket.
 *
 * Usage:
 *   const [client, server] = createMemoryTransportPair();
 *   // data sent on client arrives on server, and vice versa
 */

import type { EndHandler, Transport } from "./types.js";

export class InMemoryTransport implements Transport {
    readonly target: string;
    private _connected = true;
    private _peer: InMemoryTransport | null = null;
    private dataHandler: ((chunk: Buffer | string) => void) | null = null;
    private endHandler: EndHandler | null = null;
    private queued: Array<Buffer | string> = [];
    private _closeCount = 0;

    constructor(target = "memory") {
        this.target = target;
    }

    get connected(): boolean {
        return this._connected;
    }

    /** How many times close() actually tore the transport down. */
    get closeCount(): number {
        return this._closeCount;
    }

    /** Link this transport to its peer (internal use). */
    _setPeer(peer: InMemoryTransport): void {
        this._peer = peer;
    }

    send(data: string): boolean {
        if (!this._connected) return false;
        if (!this._peer || !this._peer._connected) return false;
        this._peer.deliver(data);
        return true;
    }

    /** Deliver raw chunks (string or bytes) to this end, as if the peer had sent them. */
    inject(chunk: Buffer | string): void {
        if (!this._connected) return;
        this.deliver(chunk);
    }

    startReceiving(onData: (chunk: Buffer | string) => void, onEnd?: EndHandler): void {
        this.dataHandler = onData;
        this.endHandler = onEnd ?? null;
        const pending = this.queued;
        this.queued = [];
        for (const chunk of pending) {
            onData(chunk);
        }
        if (!this._connected) {
            this.notifyEnd();
        }
    }

    close(): void {
        if (!this._connected) return;
        this._connected = false;
        this._closeCount++;
        this.notifyEnd();
        // Also close the peer (like a real socket)
        if (this._peer && this._peer._connected) {
            this._peer.close();
        }
    }

    /** End the stream with an error (for testing error handling). */
    _injectError(err: Error): void {
        if (!this._connected) return;
        this._connected = false;
        this.notifyEnd(err);
    }

    private deliver(chunk: Buffer | string): void {
        if (this.dataHandler) {
            this.dataHandler(chunk);
        } else {
            this.queued.push(chunk);
        }
    }

    private notifyEnd(err?: Error): void {
        const handler = this.endHandler;
        if (!handler) return;
        this.endHandler = null;
        handler(err);
    }
}

/**
 * Create a pair of connected in-memory transports.
 * Data sent on [0] is delivered to [1]'s data handler, and vice versa.
 */
export function createMemoryTransportPair(): [InMemoryTransport, InMemoryTransport] {
    const a = new InMemoryTransport("memory:client");
    const b = new InMemoryTransport("memory:server");
    a._setPeer(b);
    b._setPeer(a);
    return [a, b];
}
