/**
 * Client State
 *
 * Connection and game lifecycle of one client process:
 *
 *   DISCONNECTED → CONNECTED → JOINED → PLAYING → GAME_OVER
 *
 * One instance is built at startup and handed to the router, controller
 * and views. The router is the only writer. A transition whose guard does
 * not hold is ignored: the server may repeat or reorder notifications and
 * they must not corrupt local state.
 */

import { EventEmitter } from "node:events";

export enum ClientState {
    DISCONNECTED = "DISCONNECTED",
    CONNECTED = "CONNECTED",
    /** Joined as a player, waiting for the game to start */
    JOINED = "JOINED",
    PLAYING = "PLAYING",
    GAME_OVER = "GAME_OVER",
}

/** Slot 1 controls both colors; slot 2 is one side of a two-player game. */
export type PlayerNumber = 0 | 1 | 2;

export interface ClientStateSnapshot {
    state: ClientState;
    /** "" in single-player mode, null before joining */
    playerColor: string | null;
    playerNumber: PlayerNumber;
    sessionId: string | null;
}

const RESETTABLE = new Set([ClientState.JOINED, ClientState.PLAYING, ClientState.GAME_OVER]);

export class ClientContext extends EventEmitter {
    private _state: ClientState = ClientState.DISCONNECTED;
    private _playerColor: string | null = null;
    private _playerNumber: PlayerNumber = 0;
    private _sessionId: string | null = null;

    get state(): ClientState {
        return this._state;
    }

    get playerColor(): string | null {
        return this._playerColor;
    }

    get playerNumber(): PlayerNumber {
        return this._playerNumber;
    }

    get sessionId(): string | null {
        return this._sessionId;
    }

    // === Transitions ===

    // Each transition returns false when its guard refused it.

    /** DISCONNECTED → CONNECTED */
    onConnected(sessionId: string): boolean {
        if (this._state !== ClientState.DISCONNECTED) return false;
        this._sessionId = sessionId;
        this.moveTo(ClientState.CONNECTED);
        return true;
    }

    /** CONNECTED → JOINED, only for the session we were given. */
    onJoined(sessionId: string | undefined, singlePlayer: boolean, color: string): boolean {
        if (this._state !== ClientState.CONNECTED || this._sessionId !== sessionId) return false;

        if (singlePlayer) {
            this._playerColor = "";
            this._playerNumber = 1;
        } else {
            this._playerColor = color;
            this._playerNumber = 2;
        }
        this.moveTo(ClientState.JOINED);
        return true;
    }

    /** JOINED → PLAYING */
    onGameStarted(): boolean {
        if (this._state !== ClientState.JOINED) return false;
        this.moveTo(ClientState.PLAYING);
        return true;
    }

    /** PLAYING → GAME_OVER */
    onGameOver(): boolean {
        if (this._state !== ClientState.PLAYING) return false;
        this.moveTo(ClientState.GAME_OVER);
        return true;
    }

    /** JOINED/PLAYING/GAME_OVER → CONNECTED. The session id survives so the player can rejoin. */
    onReset(): boolean {
        if (!RESETTABLE.has(this._state)) return false;
        this._playerColor = null;
        this._playerNumber = 0;
        this.moveTo(ClientState.CONNECTED);
        return true;
    }

    /** any → DISCONNECTED */
    onDisconnected(): void {
        this._playerColor = null;
        this._playerNumber = 0;
        this._sessionId = null;
        this.moveTo(ClientState.DISCONNECTED);
    }

    // === Guards ===

    canJoin(): boolean {
        return this._state === ClientState.CONNECTED;
    }

    canStart(): boolean {
        return this._state === ClientState.JOINED;
    }

    canMove(): boolean {
        return this._state === ClientState.PLAYING;
    }

    canDisplayBoard(): boolean {
        return this._state === ClientState.PLAYING || this._state === ClientState.GAME_OVER;
    }

    canEnd(): boolean {
        return RESETTABLE.has(this._state);
    }

    snapshot(): ClientStateSnapshot {
        return {
            state: this._state,
            playerColor: this._playerColor,
            playerNumber: this._playerNumber,
            sessionId: this._sessionId,
        };
    }

    /**
     * Resolve true once the context reaches `state`, or false after
     * `timeoutMs`. Resolves immediately when already there.
     */
    waitForState(state: ClientState, timeoutMs: number): Promise<boolean> {
        if (this._state === state) return Promise.resolve(true);

        return new Promise((resolve) => {
            const onTransition = (_from: ClientState, to: ClientState) => {
                if (to !== state) return;
                clearTimeout(timer);
                this.off("transition", onTransition);
                resolve(true);
            };
            const timer = setTimeout(() => {
                this.off("transition", onTransition);
                resolve(false);
            }, timeoutMs);
            this.on("transition", onTransition);
        });
    }

    private moveTo(next: ClientState): void {
        const prev = this._state;
        this._state = next;
        if (prev !== next) {
            this.emit("transition", prev, next);
        }
    }
}

// Type-safe event interface
export interface ClientContext {
    on(event: "transition", listener: (from: ClientState, to: ClientState) => void): this;
    off(event: "transition", listener: (from: ClientState, to: ClientState) => void): this;
    emit(event: "transition", from: ClientState, to: ClientState): boolean;
}
