/**
 * Transport Layer Types
 *
 * The session talks to the server through this interface instead of
 * net.Socket directly. Implemented by TcpTransport and UnixTransport
 * (production) and InMemoryTransport (tests).
 */

/** Called once when the stream ends: peer shutdown, read error or local close. */
export type EndHandler = (err?: Error) => void;

/** A connected byte stream. */
export interface Transport {
    /**
     * Write data to the peer. Returns false, without throwing, when the
     * transport is closed or the write fails.
     */
    send(data: string): boolean;
    /**
     * Begin delivering received chunks. Returns immediately; `onData` runs
     * once per non-empty read and `onEnd` once when the stream is over.
     */
    startReceiving(onData: (chunk: Buffer | string) => void, onEnd?: EndHandler): void;
    /** Close the transport. Closing twice is a no-op. */
    close(): void;
    /** Whether the transport is currently connected */
    readonly connected: boolean;
    /** Where this transport points, for logs: "host:port" or a socket path. */
    readonly target: string;
}
