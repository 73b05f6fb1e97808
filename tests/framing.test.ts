import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { LineFramer } from "../src/framing.js";
import type { FramingError } from "../src/errors.js";

describe("LineFramer", () => {
    it("returns a single complete line without its newline", () => {
        const framer = new LineFramer();
        assert.deepEqual(framer.push('{"type":"game_reset"}\n'), ['{"type":"game_reset"}']);
        assert.equal(framer.pending, 0);
    });

    it("returns several lines from one chunk in order", () => {
        const framer = new LineFramer();
        const messages = framer.push('{"n":1}\n{"n":2}\n{"n":3}\n');
        assert.deepEqual(messages, ['{"n":1}', '{"n":2}', '{"n":3}']);
    });

    it("holds a fragment until its newline arrives", () => {
        const framer = new LineFramer();
        assert.deepEqual(framer.push('{"type":"game_'), []);
        assert.equal(framer.pending, 14);
        assert.deepEqual(framer.push('over"}\n{"ty'), ['{"type":"game_over"}']);
        assert.equal(framer.pending, 4);
        assert.deepEqual(framer.push('pe":"game_reset"}\n'), ['{"type":"game_reset"}']);
    });

    it("yields the same messages whatever the split offset", () => {
        const stream = '{"type":"session_created","session_id":"s1"}\n{"type":"error","error":"bad"}\n';
        const expected = ['{"type":"session_created","session_id":"s1"}', '{"type":"error","error":"bad"}'];

        for (let cut = 0; cut <= stream.length; cut++) {
            const framer = new LineFramer();
            const messages = [...framer.push(stream.slice(0, cut)), ...framer.push(stream.slice(cut))];
            assert.deepEqual(messages, expected, `split at ${cut}`);
        }
    });

    it("handles byte-at-a-time feeding", () => {
        const framer = new LineFramer();
        const bytes = Buffer.from('{"type":"game_reset"}\n');
        const messages: string[] = [];
        for (let i = 0; i < bytes.length; i++) {
            messages.push(...framer.push(bytes.subarray(i, i + 1)));
        }
        assert.deepEqual(messages, ['{"type":"game_reset"}']);
    });

    it("reassembles a multibyte character split across chunks", () => {
        const framer = new LineFramer();
        const bytes = Buffer.from('{"status":"Spiel läuft ♞"}\n');
        const knight = bytes.indexOf(Buffer.from("♞"));

        // Cut inside the three-byte knight
        assert.deepEqual(framer.push(bytes.subarray(0, knight + 1)), []);
        assert.deepEqual(framer.push(bytes.subarray(knight + 1)), ['{"status":"Spiel läuft ♞"}']);
    });

    it("skips blank and whitespace-only lines", () => {
        const framer = new LineFramer();
        assert.deepEqual(framer.push('\n  \n{"n":1}\n\n'), ['{"n":1}']);
    });

    it("drops an over-long fragment and resumes at the next newline", () => {
        const overflows: FramingError[] = [];
        const framer = new LineFramer({ maxMessageSize: 8, onOverflow: (err) => overflows.push(err) });

        assert.deepEqual(framer.push("0123456789"), []);
        assert.equal(overflows.length, 1);
        assert.equal(overflows[0]?.size, 10);
        assert.equal(overflows[0]?.limit, 8);
        assert.equal(framer.pending, 0);

        // The rest of the long line is discarded, the next line survives
        assert.deepEqual(framer.push("abc"), []);
        assert.deepEqual(framer.push('def\n{"n":1}\n'), ['{"n":1}']);
        assert.equal(overflows.length, 1);
    });

    it("accepts a complete long line that arrives in one chunk with its newline", () => {
        const framer = new LineFramer({ maxMessageSize: 4 });
        assert.deepEqual(framer.push("0123456789\n"), ["0123456789"]);
    });

    it("reset() clears pending data", () => {
        const framer = new LineFramer();
        framer.push('{"partial":');
        assert.ok(framer.pending > 0);
        framer.reset();
        assert.equal(framer.pending, 0);
        assert.deepEqual(framer.push('{"n":2}\n'), ['{"n":2}']);
    });
});
