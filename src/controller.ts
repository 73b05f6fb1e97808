/**
 * Game Controller
 *
 * Turns user actions into outbound commands. Every command checks the
 * matching state guard first; a refused command is reported through the
 * view and nothing is sent. The controller never mutates the state
 * machine: only server events (via the router) do that.
 */

import type { GameModel } from "./model.js";
import type { ClientCommand, Color } from "./protocol.js";
import type { ClientContext } from "./state.js";
import { defaultLogger, type ClientLogger } from "./logger.js";
import type { UserCommand, View } from "./view.js";

/** Anything that can put a command on the wire (a ClientSession). */
export interface CommandSender {
    send(cmd: ClientCommand): boolean;
}

const SQUARE = /^[a-h][1-8]$/;

export class GameController {
    private readonly context: ClientContext;
    private readonly model: GameModel;
    private readonly view: View;
    private readonly logger: ClientLogger;
    private sender: CommandSender | null;

    constructor(
        context: ClientContext,
        model: GameModel,
        view: View,
        sender: CommandSender | null = null,
        logger: ClientLogger = defaultLogger,
    ) {
        this.context = context;
        this.model = model;
        this.view = view;
        this.sender = sender;
        this.logger = logger;
    }

    setSender(sender: CommandSender | null): void {
        this.sender = sender;
    }

    join(color: Color): boolean {
        if (!this.context.canJoin()) {
            this.view.displayError("Cannot join in current state");
            return false;
        }
        if (this.model.isJoined(color)) {
            this.view.displayError(`${color} is already taken`);
            return false;
        }
        return this.send({ command: "join_game", color, single_player: false }, `Sent join command: ${color}`);
    }

    joinSinglePlayer(): boolean {
        if (!this.context.canJoin()) {
            this.view.displayError("Cannot join in current state");
            return false;
        }
        if (this.model.isJoined("white") || this.model.isJoined("black")) {
            this.view.displayError("Single-player mode needs both colors free");
            return false;
        }
        const sent = this.send({ command: "join_game", single_player: true }, "Sent single-player join command");
        if (sent) {
            this.view.displayInfo("Single-player mode: you control both sides");
        }
        return sent;
    }

    start(): boolean {
        if (!this.context.canStart()) {
            this.view.displayError("Cannot start - not in JOINED state");
            return false;
        }
        if (!this.model.bothPlayersJoined) {
            this.view.displayWarning("Cannot start - waiting for both players");
            return false;
        }
        return this.send({ command: "start_game" }, "Sent start game command");
    }

    move(from: string, to: string): boolean {
        if (!this.context.canMove()) {
            this.view.displayError("Cannot move in current state");
            return false;
        }
        const src = from.toLowerCase();
        const dest = to.toLowerCase();
        if (!SQUARE.test(src) || !SQUARE.test(dest)) {
            this.view.displayError(`Invalid move format: ${from}-${to}`);
            return false;
        }
        return this.send({ command: "make_move", from: src, to: dest }, `Sent move: ${src}-${dest}`);
    }

    /** Send a move in free notation ("e4", "Nf3", "O-O"); the server parses it. */
    moveNotation(text: string): boolean {
        if (!this.context.canMove()) {
            this.view.displayError("Cannot move in current state");
            return false;
        }
        const move = text.trim();
        if (!move) {
            this.view.displayError("Invalid move format");
            return false;
        }
        return this.send({ command: "make_move", move }, `Sent move: ${move}`);
    }

    displayBoard(): boolean {
        if (!this.context.canDisplayBoard()) {
            this.view.displayError("Cannot display board in current state");
            return false;
        }
        return this.send({ command: "display_board" }, "Sent display board command");
    }

    endGame(): boolean {
        if (!this.context.canEnd()) {
            this.view.displayError("No game to end");
            return false;
        }
        return this.send({ command: "end_game" }, "Sent end game command");
    }

    /**
     * Run a parsed user command. Returns false when the command was refused
     * or could not be sent. "quit" and "upload" belong to the client
     * lifecycle and are not handled here.
     */
    async handle(cmd: UserCommand): Promise<boolean> {
        switch (cmd.kind) {
            case "single":
                return this.joinSinglePlayer();
            case "join":
                return this.join(cmd.color);
            case "start":
                return this.start();
            case "move":
                return this.move(cmd.from, cmd.to);
            case "move_text":
                return this.moveNotation(cmd.text);
            case "board":
                return this.displayBoard();
            case "end":
            case "restart":
                if (!(await this.view.confirmAction(cmd.kind === "end" ? "End the game?" : "Restart the game?"))) {
                    return false;
                }
                return this.endGame();
            case "refresh":
                return true;
            case "invalid":
                this.view.displayError(cmd.reason);
                return false;
            case "upload":
            case "quit":
                this.logger.warn(`Command '${cmd.kind}' is handled by the client, not the controller`);
                return false;
        }
    }

    private send(cmd: ClientCommand, logLine: string): boolean {
        if (!this.sender) {
            this.view.displayError("Not connected to server");
            return false;
        }
        if (!this.sender.send(cmd)) {
            this.view.displayError("Failed to send command to server");
            return false;
        }
        this.logger.info(logLine);
        return true;
    }
}
