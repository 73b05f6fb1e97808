import * as path from "node:path";
import { GameController } from "./controller.js";
import { toError } from "./errors.js";
import { defaultLogger, type ClientLogger } from "./logger.js";
import { GameModel } from "./model.js";
import { ResponseRouter } from "./router.js";
import { ClientSession } from "./session.js";
import { ClientContext, ClientState } from "./state.js";
import { createTransport, describeTarget, type TransportTarget } from "./transport/factory.js";
import type { Transport } from "./transport/types.js";
import { uploadGameFile } from "./upload.js";
import { menuSnapshot, type View } from "./view.js";

/** Opens the transport for a target. Tests swap in an in-memory pair. */
export type Connector = (target: TransportTarget) => Promise<Transport>;

export interface ChessClientOptions {
    target: TransportTarget;
    view: View;
    /** Game script uploaded once the server has created our session */
    gameFile?: string;
    logger?: ClientLogger;
    connector?: Connector;
    /** Pause between upload chunks. Default: the uploader's own. */
    uploadDelayMs?: number;
}

/**
 * A ChessClient wires one connection to one game: transport, session,
 * router, state machine, model and controller.
 *
 * Lifecycle: connect() opens the transport and starts the receive loop;
 * run() does that, waits for the server's session, then reads user
 * commands until the user quits or the server goes away; stop() tears
 * everything down and may be called any number of times.
 */
export class ChessClient {
    readonly context = new ClientContext();
    readonly model = new GameModel();
    readonly controller: GameController;

    private readonly target: TransportTarget;
    private readonly view: View;
    private readonly logger: ClientLogger;
    private readonly connector: Connector;
    private readonly router: ResponseRouter;
    private readonly gameFile: string | undefined;
    private readonly uploadDelayMs: number | undefined;
    private session: ClientSession | null = null;
    private stopped = false;

    constructor(options: ChessClientOptions) {
        this.target = options.target;
        this.view = options.view;
        this.logger = options.logger ?? defaultLogger;
        this.connector = options.connector ?? createTransport;
        this.gameFile = options.gameFile;
        this.uploadDelayMs = options.uploadDelayMs;
        this.router = new ResponseRouter(this.context, this.model, this.view, { logger: this.logger });
        this.controller = new GameController(this.context, this.model, this.view, null, this.logger);
    }

    /** True while the session is receiving and accepting sends. */
    get connected(): boolean {
        return this.session?.active ?? false;
    }

    /** Open the transport and start the session. Returns false if the server can't be reached. */
    async connect(): Promise<boolean> {
        if (this.session) {
            this.logger.warn("Already connected");
            return true;
        }

        const where = describeTarget(this.target);
        let transport: Transport;
        try {
            transport = await this.connector(this.target);
        } catch (err) {
            const error = toError(err);
            this.logger.error(`Failed to connect to ${where}`, { error: error.message });
            this.view.displayError(error.message);
            return false;
        }

        const session = new ClientSession(transport, this.router, { logger: this.logger });
        session.on("disconnect", (err) => this.onDisconnect(err));
        this.session = session;
        this.controller.setSender(session);
        session.start();
        this.logger.info(`Connected to ${where}`);
        return true;
    }

    /**
     * Connect, then run the input loop. Resolves with the process exit
     * code: 0 after a normal quit, 1 when no session could be set up.
     */
    async run(): Promise<number> {
        this.view.displayWelcome();
        if (!(await this.connect())) {
            return 1;
        }

        const ready = await this.context.waitForState(ClientState.CONNECTED, this.target.connectTimeoutMs);
        if (!ready) {
            this.view.displayError("Server did not create a session in time");
            this.stop();
            return 1;
        }

        if (this.gameFile) {
            await this.upload(this.gameFile);
        }

        this.view.displayMenu(menuSnapshot(this.context, this.model));
        await this.inputLoop();
        this.stop();
        return 0;
    }

    /** Send a game file in chunks over the current session. */
    async upload(filePath: string): Promise<boolean> {
        const session = this.session;
        if (!session?.active) {
            this.view.displayError("Not connected to server");
            return false;
        }

        this.view.displayInfo(`Uploading ${path.basename(filePath)}...`);
        const result = await uploadGameFile(filePath, session, {
            logger: this.logger,
            delayMs: this.uploadDelayMs,
        });
        if (result.ok) {
            this.view.displaySuccess(`Uploaded ${result.filename} (${result.chunksTotal} chunks)`);
        } else {
            this.view.displayError(`Upload failed: ${result.error ?? "unknown error"}`);
        }
        return result.ok;
    }

    /** Close the session and the view's input. Safe to call more than once. */
    stop(): void {
        if (this.stopped) return;
        this.stopped = true;
        this.controller.setSender(null);
        this.session?.close();
        this.context.onDisconnected();
        // Ends an open prompt, so the input loop returns without a keypress
        this.view.close();
        this.logger.info("Client stopped");
    }

    private async inputLoop(): Promise<void> {
        while (!this.stopped) {
            const cmd = await this.view.waitForInput(menuSnapshot(this.context, this.model));
            if (this.stopped) return;

            switch (cmd.kind) {
                case "quit":
                    if (cmd.force || this.context.state !== ClientState.PLAYING) return;
                    if (await this.view.confirmAction("A game is in progress. Quit anyway?")) return;
                    break;
                case "upload":
                    await this.upload(cmd.path);
                    break;
                case "refresh":
                    this.view.displayMenu(menuSnapshot(this.context, this.model));
                    break;
                default:
                    await this.controller.handle(cmd);
            }
        }
    }

    private onDisconnect(err?: Error): void {
        this.context.onDisconnected();
        this.controller.setSender(null);
        if (err) {
            this.view.displayError(`Connection lost: ${err.message}`);
        } else {
            this.view.displayWarning("Server closed connection");
        }
        this.stop();
    }
}
