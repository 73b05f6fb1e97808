/**
 * Client Session
 *
 * Owns one Transport. Reassembles the received byte stream into complete
 * JSON lines and hands each one, in order, to a message sink (the response
 * router). Outbound commands are serialized and written in a single
 * non-blocking attempt.
 *
 * Node delivers socket data on one thread, so the pending buffer is only
 * ever touched from inside a synchronous data callback or close(): neither
 * can interleave with the other. The `active` flag is the check-and-set
 * that makes close() run once.
 */

import { EventEmitter } from "node:events";
import { LineFramer } from "./framing.js";
import { defaultLogger, type ClientLogger } from "./logger.js";
import { serialize, type ClientCommand } from "./protocol.js";
import type { Transport } from "./transport/types.js";
import { toError } from "./errors.js";

/** Receives each complete message. Must not block. */
export interface MessageSink {
    route(raw: string): void;
}

export interface ClientSessionOptions {
    logger?: ClientLogger;
    /** Longest line accepted before it is dropped. */
    maxMessageSize?: number;
}

export class ClientSession extends EventEmitter {
    private readonly transport: Transport;
    private readonly sink: MessageSink;
    private readonly logger: ClientLogger;
    private readonly framer: LineFramer;
    private _active = false;
    private started = false;

    constructor(transport: Transport, sink: MessageSink, options: ClientSessionOptions = {}) {
        super();
        this.transport = transport;
        this.sink = sink;
        this.logger = options.logger ?? defaultLogger;
        this.framer = new LineFramer({
            maxMessageSize: options.maxMessageSize,
            onOverflow: (err) => {
                this.logger.error("Dropping oversized message", { size: err.size, limit: err.limit });
            },
        });
    }

    get active(): boolean {
        return this._active;
    }

    /** Begin the transport's receive loop and accept sends. */
    start(): void {
        if (this.started) {
            this.logger.warn("Client session already started");
            return;
        }
        this.started = true;
        this._active = true;
        this.transport.startReceiving(
            (chunk) => this.onReceive(chunk),
            (err) => this.onEnd(err),
        );
        this.logger.debug("Client session started", { target: this.transport.target });
    }

    /**
     * Serialize and send one command. Returns false, and logs, when the
     * session is not active or the transport refuses the write.
     */
    send(cmd: ClientCommand): boolean {
        if (!this._active) {
            this.logger.warn("Cannot send - session not active", { command: cmd.command });
            return false;
        }

        let line: string;
        try {
            line = serialize(cmd);
        } catch (err) {
            this.logger.error("Failed to serialize message", { command: cmd.command, error: toError(err).message });
            return false;
        }

        if (!this.transport.send(line)) {
            this.logger.error("Failed to send message", { command: cmd.command });
            return false;
        }
        this.logger.debug(`Sent: ${line.trimEnd()}`);
        return true;
    }

    /** Close the session and its transport. Only the first call does anything. */
    close(): void {
        if (!this._active) return;
        this._active = false;

        this.transport.close();
        this.framer.reset();
        this.logger.debug("Client session closed");
    }

    private onReceive(chunk: Buffer | string): void {
        if (!this._active) return;

        for (const message of this.framer.push(chunk)) {
            // A handler may have closed the session part-way through a chunk
            if (!this._active) return;
            this.dispatch(message);
        }
    }

    private dispatch(message: string): void {
        try {
            this.sink.route(message);
        } catch (err) {
            this.logger.error("Error routing message", { error: toError(err).message, raw: message });
        }
    }

    private onEnd(err?: Error): void {
        if (!this._active) {
            this.logger.debug("Transport ended after session close");
            return;
        }
        this._active = false;
        this.framer.reset();

        if (err) {
            this.logger.error("Connection lost", { target: this.transport.target, error: err.message });
        } else {
            this.logger.info("Server closed connection", { target: this.transport.target });
        }
        this.transport.close();
        this.emit("disconnect", err);
    }
}

// Type-safe event interface
export interface ClientSession {
    on(event: "disconnect", listener: (err?: Error) => void): this;
    once(event: "disconnect", listener: (err?: Error) => void): this;
    emit(event: "disconnect", err?: Error): boolean;
}
