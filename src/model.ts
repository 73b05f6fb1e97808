/**
 * Game Data Model
 *
 * Client-side view of the game: who has joined, how many moves have been
 * played and whose turn it is. Written only by the response router; the
 * controller and views read it through `snapshot()`.
 */

import type { Color } from "./protocol.js";

/** The color that moves first. */
export const PRIMARY_COLOR: Color = "white";
export const SECONDARY_COLOR: Color = "black";

/** One accepted move, as reported by the server. */
export interface MoveRecord {
    index: number;
    color: string;
    piece: string;
    src: string;
    dest: string;
    capture?: boolean;
    capturedColor?: string;
    capturedPiece?: string;
    castling?: boolean;
    /** "big" or "little" */
    castlingKind?: string;
    check?: boolean;
    checkmate?: boolean;
    stalemate?: boolean;
}

export interface GameDataSnapshot {
    whiteJoined: boolean;
    blackJoined: boolean;
    /** null until the game starts */
    moveCount: number | null;
    currentTurn: Color | null;
}

export type TerminalReason = "Checkmate" | "Stalemate";

/**
 * Human-readable description of a move.
 *
 *     describeMove({ index: 1, color: "white", piece: "pawn", src: "e2", dest: "e4" })
 *     // "1. white pawn moves from e2 to e4"
 */
export function describeMove(move: MoveRecord): string {
    let msg = `${move.index}. ${move.color} ${move.piece}`;

    if (move.castling) {
        const kind = move.castlingKind ? `${move.castlingKind} ` : "";
        msg += ` does a ${kind}castling from ${move.src} to ${move.dest}`;
    } else if (move.capture) {
        msg += ` on ${move.src} takes ${move.capturedColor ?? ""} ${move.capturedPiece ?? ""} on ${move.dest}`;
    } else {
        msg += ` moves from ${move.src} to ${move.dest}`;
    }

    return msg;
}

/** ". Checkmate", ". Check", ". Stalemate" or "" (checkmate wins over check). */
export function moveSuffix(move: MoveRecord): string {
    if (move.checkmate) return ". Checkmate";
    if (move.check) return ". Check";
    if (move.stalemate) return ". Stalemate";
    return "";
}

export function terminalReason(move: MoveRecord): TerminalReason | null {
    if (move.checkmate) return "Checkmate";
    if (move.stalemate) return "Stalemate";
    return null;
}

/** Odd counters belong to the primary color, even ones to the secondary. */
export function turnForMove(index: number): Color {
    return Math.abs(index) % 2 === 1 ? PRIMARY_COLOR : SECONDARY_COLOR;
}

export class GameModel {
    private whiteJoined = false;
    private blackJoined = false;
    private moveCount: number | null = null;
    private currentTurn: Color | null = null;

    setPlayerJoined(color: Color): void {
        if (color === "white") {
            this.whiteJoined = true;
        } else {
            this.blackJoined = true;
        }
    }

    isJoined(color: Color): boolean {
        return color === "white" ? this.whiteJoined : this.blackJoined;
    }

    get bothPlayersJoined(): boolean {
        return this.whiteJoined && this.blackJoined;
    }

    startGame(): void {
        this.moveCount = 1;
        this.currentTurn = PRIMARY_COLOR;
    }

    /** Adopt the server's move index as the counter and derive the turn from it. */
    updateTurn(moveIndex: number): void {
        this.moveCount = moveIndex;
        this.currentTurn = turnForMove(moveIndex);
    }

    reset(): void {
        this.whiteJoined = false;
        this.blackJoined = false;
        this.moveCount = null;
        this.currentTurn = null;
    }

    snapshot(): GameDataSnapshot {
        return {
            whiteJoined: this.whiteJoined,
            blackJoined: this.blackJoined,
            moveCount: this.moveCount,
            currentTurn: this.currentTurn,
        };
    }
}
