/**
 * View contract
 *
 * Everything the client shows or asks goes through this interface; the
 * session, state machine and router never write to the terminal
 * themselves. Any front end (console, graphical board, remote UI) plugs in
 * by implementing it.
 */

import type { GameDataSnapshot } from "./model.js";
import type { BoardData, Color } from "./protocol.js";
import type { ClientStateSnapshot } from "./state.js";

/** What the menu needs to render: lifecycle state plus game data. */
export interface MenuSnapshot extends ClientStateSnapshot, GameDataSnapshot {}

/** A user action, as parsed by the view. */
export type UserCommand =
    | { kind: "single" }
    | { kind: "join"; color: Color }
    | { kind: "start" }
    | { kind: "move"; from: string; to: string }
    | { kind: "move_text"; text: string }
    | { kind: "board" }
    | { kind: "end" }
    | { kind: "restart" }
    | { kind: "upload"; path: string }
    | { kind: "refresh" }
    | { kind: "quit"; force?: boolean }
    | { kind: "invalid"; input: string; reason: string };

export interface View {
    displayWelcome(): void;
    displayBoard(board: BoardData): void;
    displayGameOver(result: string): void;
    displayMenu(snapshot: MenuSnapshot): void;
    displayInfo(message: string): void;
    displayWarning(message: string): void;
    displayError(message: string): void;
    displaySuccess(message: string): void;
    confirmAction(prompt: string): Promise<boolean>;
    waitForInput(snapshot: MenuSnapshot): Promise<UserCommand>;
    /** Release per-game rendering resources, such as a board window. Called on reset. */
    cleanup(): void;
    /** Stop reading input for good. A pending `waitForInput` resolves as a forced quit. */
    close(): void;
}

/** Combine the lifecycle and game snapshots the menu is drawn from. */
export function menuSnapshot(
    context: { snapshot(): ClientStateSnapshot },
    model: { snapshot(): GameDataSnapshot },
): MenuSnapshot {
    return { ...context.snapshot(), ...model.snapshot() };
}
