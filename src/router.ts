/**
 * Response Router
 *
 * Decodes each framed line from the server into a typed event and applies
 * it: state machine transition, game model update, then view calls.
 * Handlers are short synchronous mutations; nothing here blocks or throws.
 */

import { defaultLogger, type ClientLogger } from "./logger.js";
import {
    decodeServerEvent,
    isColor,
    toMoveRecord,
    type BoardDisplay,
    type GameOver,
    type GameReady,
    type GameStarted,
    type JoinSuccess,
    type MoveResult,
    type PlayerJoined,
    type ServerError,
    type ServerEvent,
    type SessionCreated,
} from "./protocol.js";
import { describeMove, moveSuffix, terminalReason, type GameModel } from "./model.js";
import type { ClientContext } from "./state.js";
import type { MessageSink } from "./session.js";
import { formatTimestamp } from "./util.js";
import { menuSnapshot, type View } from "./view.js";

export interface ResponseRouterOptions {
    logger?: ClientLogger;
    /** Redraw the menu after events that change what the user can do. Default: true. */
    refreshMenu?: boolean;
}

export class ResponseRouter implements MessageSink {
    private readonly context: ClientContext;
    private readonly model: GameModel;
    private readonly view: View;
    private readonly logger: ClientLogger;
    private readonly refreshMenu: boolean;

    constructor(context: ClientContext, model: GameModel, view: View, options: ResponseRouterOptions = {}) {
        this.context = context;
        this.model = model;
        this.view = view;
        this.logger = options.logger ?? defaultLogger;
        this.refreshMenu = options.refreshMenu ?? true;
    }

    /** Route one complete message from the server. */
    route(raw: string): void {
        const result = decodeServerEvent(raw);

        if (!result.ok) {
            switch (result.reason) {
                case "invalid_json":
                    this.logger.error(`Invalid JSON from server: ${result.error}`, { raw });
                    return;
                case "not_an_object":
                    this.logger.error("Server message is not a JSON object", { raw });
                    return;
                case "unknown_type":
                    this.logger.warn(`Unknown message type: ${result.kind}`, { raw });
                    return;
                case "invalid_payload":
                    this.logger.warn(`Malformed ${result.kind} message`, { problems: result.problems, raw });
                    return;
            }
        }

        this.logger.debug(`Routing message type: ${result.event.type}`);
        this.dispatch(result.event);
    }

    private dispatch(event: ServerEvent): void {
        switch (event.type) {
            case "session_created":
                return this.handleSessionCreated(event);
            case "join_success":
                return this.handleJoinSuccess(event);
            case "player_joined":
                return this.handlePlayerJoined(event);
            case "game_ready":
                return this.handleGameReady(event);
            case "game_started":
                return this.handleGameStarted(event);
            case "move_result":
                return this.handleMoveResult(event);
            case "board_display":
                return this.handleBoardDisplay(event);
            case "game_over":
                return this.handleGameOver(event);
            case "game_reset":
                return this.handleGameReset();
            case "error":
                return this.handleError(event);
            default: {
                const unhandled: never = event;
                this.logger.warn("Unhandled message", { event: unhandled });
            }
        }
    }

    // ========== Message Handlers ==========

    private handleSessionCreated(event: SessionCreated): void {
        this.context.onConnected(event.session_id);
        this.view.displaySuccess(`Connected to server (session ${event.session_id})`);
    }

    private handleJoinSuccess(event: JoinSuccess): void {
        const singlePlayer = event.single_player ?? false;
        const color = event.color ?? "";

        if (!this.context.onJoined(event.session_id, singlePlayer, color)) {
            this.logger.warn("Ignoring join_success", { state: this.context.state, sessionId: event.session_id });
            return;
        }

        if (singlePlayer) {
            // Player 1 plays both colors
            this.model.setPlayerJoined("white");
            this.model.setPlayerJoined("black");
            this.view.displaySuccess("Joined as white and black");
        } else if (isColor(color)) {
            this.model.setPlayerJoined(color);
            this.view.displaySuccess(`Joined as ${color}`);
        } else {
            this.logger.warn("join_success without a usable color", { color });
        }

        if (event.status) {
            this.view.displayInfo(event.status);
        }
        this.redraw();
    }

    private handlePlayerJoined(event: PlayerJoined): void {
        this.model.setPlayerJoined(event.color);

        this.view.displayInfo(`Another player joined as ${event.color}`);
        if (event.status) {
            this.view.displayInfo(event.status);
        }
        if (this.model.bothPlayersJoined) {
            this.view.displayInfo("Both players ready! You can now start the game.");
        }
        this.redraw();
    }

    private handleGameReady(event: GameReady): void {
        if (event.white_player) this.model.setPlayerJoined("white");
        if (event.black_player) this.model.setPlayerJoined("black");

        this.view.displayInfo(event.status ?? "Both players joined!");
        this.redraw();
    }

    private handleGameStarted(event: GameStarted): void {
        if (!this.context.onGameStarted()) {
            this.logger.warn("Ignoring game_started", { state: this.context.state });
            return;
        }
        this.model.startGame();

        this.view.displaySuccess(
            this.context.playerNumber === 1 ? "1-player game started!" : "2-player game started!",
        );
        if (event.board !== undefined) {
            this.view.displayBoard(event.board);
        }
        this.redraw();
    }

    private handleMoveResult(event: MoveResult): void {
        // A move that lands after the game ended or was reset is stale
        if (!this.context.canMove()) {
            this.logger.warn("Ignoring move_result", { state: this.context.state, index: event.strike.strike_number });
            return;
        }

        const move = toMoveRecord(event.strike);
        const description = describeMove(move) + moveSuffix(move);

        this.view.displayInfo(
            event.timestamp !== undefined
                ? `[${formatTimestamp(event.timestamp)}] ${description}`
                : description,
        );

        this.model.updateTurn(move.index);

        const reason = terminalReason(move);
        if (reason) {
            this.context.onGameOver();
            this.view.displayGameOver(reason);
        }
    }

    private handleBoardDisplay(event: BoardDisplay): void {
        const board = event.data?.board;
        if (board === undefined || board === "") {
            this.view.displayError("No board data received");
            return;
        }
        this.view.displayBoard(board);
    }

    private handleGameOver(event: GameOver): void {
        this.context.onGameOver();
        this.view.displayGameOver(event.result ?? "Unknown");
        this.redraw();
    }

    private handleGameReset(): void {
        this.context.onReset();
        this.model.reset();
        this.view.displayInfo("Game has been reset");
        this.view.cleanup();
        this.redraw();
    }

    private handleError(event: ServerError): void {
        this.view.displayError(event.error ?? "Unknown error");
        if (event.expected) {
            this.view.displayInfo(`Expected format: ${event.expected}`);
        }
    }

    private redraw(): void {
        if (!this.refreshMenu) return;
        this.view.displayMenu(menuSnapshot(this.context, this.model));
    }
}
