import { StringDecoder } from "node:string_decoder";
import { FramingError } from "./errors.js";

/** Default maximum length of one line: 1 MiB of characters */
const DEFAULT_MAX_MESSAGE_SIZE = 1024 * 1024;

export interface LineFramerOptions {
    maxMessageSize?: number;
    /** Called when an over-long fragment is discarded. */
    onOverflow?: (err: FramingError) => void;
}

/**
 * Stateful newline framer for the JSON-lines wire format.
 *
 * Feed every chunk read from the transport into `push()`. It returns the
 * complete messages found so far, in order, without their trailing "\n".
 * The pending buffer only ever holds the incomplete fragment after the
 * last newline.
 *
 * Buffers go through a streaming UTF-8 decoder, so a character whose bytes
 * arrive in two chunks is reassembled before it reaches the buffer.
 */
export class LineFramer {
    private buffer = "";
    private discarding = false;
    private decoder = new StringDecoder("utf8");
    private readonly maxMessageSize: number;
    private readonly onOverflow: ((err: FramingError) => void) | undefined;

    constructor(options: LineFramerOptions = {}) {
        this.maxMessageSize = options.maxMessageSize ?? DEFAULT_MAX_MESSAGE_SIZE;
        this.onOverflow = options.onOverflow;
    }

    /** Push a chunk and return any complete messages it finished. */
    push(chunk: string | Buffer): string[] {
        this.buffer += typeof chunk === "string" ? chunk : this.decoder.write(chunk);
        const messages: string[] = [];

        if (this.discarding) {
            // Still inside an over-long line: skip up to its newline
            const end = this.buffer.indexOf("\n");
            if (end === -1) {
                this.buffer = "";
                return messages;
            }
            this.buffer = this.buffer.slice(end + 1);
            this.discarding = false;
        }

        let newline = this.buffer.indexOf("\n");
        while (newline !== -1) {
            const line = this.buffer.slice(0, newline);
            this.buffer = this.buffer.slice(newline + 1);
            if (line.trim()) {
                messages.push(line);
            }
            newline = this.buffer.indexOf("\n");
        }

        if (this.buffer.length > this.maxMessageSize) {
            const err = new FramingError(this.buffer.length, this.maxMessageSize);
            this.buffer = "";
            this.discarding = true;
            this.onOverflow?.(err);
        }

        return messages;
    }

    /** Characters waiting for a newline. */
    get pending(): number {
        return this.buffer.length;
    }

    /** Reset internal buffer state. */
    reset(): void {
        this.buffer = "";
        this.discarding = false;
        this.decoder = new StringDecoder("utf8");
    }
}
