import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import * as fs from "node:fs";
import * as net from "node:net";
import { connectTcp } from "../src/transport/tcp.js";
import { connectUnix } from "../src/transport/unix-socket.js";
import { createMemoryTransportPair } from "../src/transport/memory.js";
import { createTransport, describeTarget } from "../src/transport/factory.js";
import { ConnectionError } from "../src/errors.js";
import type { Transport } from "../src/transport/types.js";
import { tmpSocketPath, waitFor } from "./helpers.js";

/** A server that records what it receives and keeps the accepted sockets. */
class EchoServer {
    readonly server: net.Server;
    readonly sockets: net.Socket[] = [];
    received = "";

    constructor() {
        this.server = net.createServer((socket) => {
            this.sockets.push(socket);
            socket.on("data", (chunk: Buffer) => {
                this.received += chunk.toString("utf8");
            });
            socket.on("error", () => {
                // Client resets are expected in these tests
            });
        });
    }

    listen(options: net.ListenOptions): Promise<void> {
        return new Promise((resolve) => this.server.listen(options, () => resolve()));
    }

    get port(): number {
        const address = this.server.address();
        if (address === null || typeof address === "string") throw new Error("not listening on TCP");
        return address.port;
    }

    close(): Promise<void> {
        for (const socket of this.sockets) socket.destroy();
        return new Promise((resolve) => this.server.close(() => resolve()));
    }
}

interface Collected {
    data: string[];
    ends: Array<Error | undefined>;
}

function collect(transport: Transport): Collected {
    const out: Collected = { data: [], ends: [] };
    transport.startReceiving(
        (chunk) => out.data.push(typeof chunk === "string" ? chunk : chunk.toString("utf8")),
        (err) => out.ends.push(err),
    );
    return out;
}

describe("TCP transport", () => {
    let server: EchoServer;

    beforeEach(async () => {
        server = new EchoServer();
        await server.listen({ host: "127.0.0.1", port: 0 });
    });

    afterEach(async () => {
        await server.close();
    });

    it("sends and receives bytes", async () => {
        const transport = await connectTcp("127.0.0.1", server.port);
        assert.equal(transport.connected, true);
        assert.equal(transport.target, `127.0.0.1:${server.port}`);

        const got = collect(transport);
        assert.equal(transport.send('{"command":"start_game"}\n'), true);
        await waitFor(() => server.received === '{"command":"start_game"}\n');

        await waitFor(() => server.sockets.length === 1);
        server.sockets[0]?.write('{"type":"game_reset"}\n');
        await waitFor(() => got.data.join("") === '{"type":"game_reset"}\n');

        transport.close();
    });

    it("reports a clean end when the server closes", async () => {
        const transport = await connectTcp("127.0.0.1", server.port);
        const got = collect(transport);

        await waitFor(() => server.sockets.length === 1);
        server.sockets[0]?.end();

        await waitFor(() => got.ends.length === 1);
        assert.equal(got.ends[0], undefined);
        assert.equal(transport.connected, false);
        assert.equal(transport.send("late\n"), false);
    });

    it("delivers data that arrived before receiving started", async () => {
        const transport = await connectTcp("127.0.0.1", server.port);
        await waitFor(() => server.sockets.length === 1);
        server.sockets[0]?.write("early\n");

        // Give the bytes time to reach the client's socket buffer
        await new Promise((r) => setTimeout(r, 30));
        const got = collect(transport);
        await waitFor(() => got.data.join("") === "early\n");
        transport.close();
    });

    it("close is idempotent and ends the stream once", async () => {
        const transport = await connectTcp("127.0.0.1", server.port);
        const got = collect(transport);
        transport.close();
        transport.close();
        await waitFor(() => got.ends.length === 1);
        assert.equal(transport.connected, false);
        await new Promise((r) => setTimeout(r, 20));
        assert.equal(got.ends.length, 1);
    });

    it("rejects with ConnectionError when nothing listens", async () => {
        const port = server.port;
        await server.close();
        await assert.rejects(connectTcp("127.0.0.1", port, 1000), (err: unknown) => {
            assert.ok(err instanceof ConnectionError);
            assert.equal(err.target, `127.0.0.1:${port}`);
            assert.equal(err.code, "connection_failed");
            return true;
        });
        // Reopen so afterEach has something to close
        server = new EchoServer();
        await server.listen({ host: "127.0.0.1", port: 0 });
    });
});

describe("Unix socket transport", () => {
    let server: EchoServer;
    let socketPath: string;

    beforeEach(async () => {
        socketPath = tmpSocketPath("chess-transport");
        server = new EchoServer();
        await server.listen({ path: socketPath });
    });

    afterEach(async () => {
        await server.close();
        fs.rmSync(socketPath, { force: true });
    });

    it("sends and receives bytes by path", async () => {
        const transport = await connectUnix(socketPath);
        assert.equal(transport.target, socketPath);
        const got = collect(transport);

        transport.send("ping\n");
        await waitFor(() => server.received === "ping\n");
        await waitFor(() => server.sockets.length === 1);
        server.sockets[0]?.write("pong\n");
        await waitFor(() => got.data.join("") === "pong\n");
        transport.close();
        await waitFor(() => got.ends.length === 1);
    });

    it("rejects with ConnectionError for a missing socket file", async () => {
        await assert.rejects(connectUnix(`${socketPath}.missing`, 1000), ConnectionError);
    });
});

describe("createTransport", () => {
    it("opens the transport the target names", async () => {
        const server = new EchoServer();
        await server.listen({ host: "127.0.0.1", port: 0 });
        const target = {
            transport: "tcp" as const,
            host: "127.0.0.1",
            port: server.port,
            socketPath: "/unused",
            connectTimeoutMs: 1000,
        };
        const transport = await createTransport(target);
        assert.equal(transport.target, `127.0.0.1:${server.port}`);
        transport.close();
        await server.close();
    });

    it("describes targets for messages", () => {
        const base = { host: "example.test", port: 2000, socketPath: "/tmp/chess.sock", connectTimeoutMs: 1 };
        assert.equal(describeTarget({ ...base, transport: "tcp" }), "example.test:2000");
        assert.equal(describeTarget({ ...base, transport: "unix" }), "Unix socket /tmp/chess.sock");
    });
});

describe("InMemoryTransport", () => {
    it("delivers sends to the peer", () => {
        const [client, server] = createMemoryTransportPair();
        const got = collect(server);
        assert.equal(client.send("hello\n"), true);
        assert.deepEqual(got.data, ["hello\n"]);
    });

    it("queues data until the peer starts receiving", () => {
        const [client, server] = createMemoryTransportPair();
        client.send("one\n");
        client.send("two\n");
        const got = collect(server);
        assert.deepEqual(got.data, ["one\n", "two\n"]);
    });

    it("closes both ends once", () => {
        const [client, server] = createMemoryTransportPair();
        const clientSide = collect(client);
        const serverSide = collect(server);
        client.close();
        client.close();
        assert.equal(client.closeCount, 1);
        assert.equal(server.closeCount, 1);
        assert.deepEqual(clientSide.ends, [undefined]);
        assert.deepEqual(serverSide.ends, [undefined]);
        assert.equal(client.send("late\n"), false);
    });

    it("ends with the injected error", () => {
        const [client] = createMemoryTransportPair();
        const got = collect(client);
        const boom = new Error("reset by peer");
        client._injectError(boom);
        assert.deepEqual(got.ends, [boom]);
        assert.equal(client.connected, false);
    });
});
