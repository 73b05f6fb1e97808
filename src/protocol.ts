/**
 * Chess Client Protocol
 *
 * Message types and serialization for the game server connection.
 * JSON-lines protocol: one object per line, "\n" terminated. The client
 * sends commands keyed by `command`; the server answers with events keyed
 * by `type`.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { MoveRecord } from "./model.js";
import { describeProblems } from "./util.js";

// === Client → Server ===

export type Color = "white" | "black";

export interface JoinGameCommand {
    command: "join_game";
    single_player: boolean;
    color?: Color;
}

export interface StartGameCommand {
    command: "start_game";
}

/** A move as two squares, or as free text the server parses. */
export type MakeMoveCommand =
    | { command: "make_move"; from: string; to: string }
    | { command: "make_move"; move: string };

export interface DisplayBoardCommand {
    command: "display_board";
}

export interface EndGameCommand {
    command: "end_game";
}

export interface UploadMetadata {
    filename: string;
    total_size: number;
    chunks_total: number;
    chunk_current: number;
}

export interface UploadGameCommand {
    command: "upload_game";
    metadata: UploadMetadata;
    data: string;
}

export type ClientCommand =
    | JoinGameCommand
    | StartGameCommand
    | MakeMoveCommand
    | DisplayBoardCommand
    | EndGameCommand
    | UploadGameCommand;

// === Server → Client ===

const ColorSchema = Type.Union([Type.Literal("white"), Type.Literal("black")]);

/** Board payloads are forwarded to the view untouched: ASCII art or a FEN object. */
export const BoardDataSchema = Type.Union([
    Type.String(),
    Type.Record(Type.String(), Type.Unknown()),
]);
export type BoardData = Static<typeof BoardDataSchema>;

export const StrikeSchema = Type.Object({
    strike_number: Type.Integer(),
    color: Type.String(),
    piece: Type.String(),
    case_src: Type.String(),
    case_dest: Type.String(),
    is_capture: Type.Optional(Type.Boolean()),
    captured_piece: Type.Optional(Type.String()),
    captured_color: Type.Optional(Type.String()),
    is_castling: Type.Optional(Type.Boolean()),
    castling_type: Type.Optional(Type.String()),
    is_check: Type.Optional(Type.Boolean()),
    is_checkmate: Type.Optional(Type.Boolean()),
    is_stalemate: Type.Optional(Type.Boolean()),
});
export type Strike = Static<typeof StrikeSchema>;

const SessionCreatedEvent = Type.Object({
    type: Type.Literal("session_created"),
    session_id: Type.String(),
});

const JoinSuccessEvent = Type.Object({
    type: Type.Literal("join_success"),
    session_id: Type.Optional(Type.String()),
    single_player: Type.Optional(Type.Boolean()),
    color: Type.Optional(Type.String()),
    status: Type.Optional(Type.String()),
});

const PlayerJoinedEvent = Type.Object({
    type: Type.Literal("player_joined"),
    color: ColorSchema,
    status: Type.Optional(Type.String()),
});

const GameReadyEvent = Type.Object({
    type: Type.Literal("game_ready"),
    status: Type.Optional(Type.String()),
    white_player: Type.Optional(Type.Unknown()),
    black_player: Type.Optional(Type.Unknown()),
});

const GameStartedEvent = Type.Object({
    type: Type.Literal("game_started"),
    board: Type.Optional(BoardDataSchema),
});

const MoveResultEvent = Type.Object({
    type: Type.Literal("move_result"),
    strike: StrikeSchema,
    board: Type.Optional(BoardDataSchema),
    /** Seconds since the game started */
    timestamp: Type.Optional(Type.Number()),
});

const BoardDisplayEvent = Type.Object({
    type: Type.Literal("board_display"),
    data: Type.Optional(Type.Object({
        board: Type.Optional(BoardDataSchema),
    })),
});

const GameOverEvent = Type.Object({
    type: Type.Literal("game_over"),
    result: Type.Optional(Type.String()),
});

const GameResetEvent = Type.Object({
    type: Type.Literal("game_reset"),
});

const ErrorEvent = Type.Object({
    type: Type.Literal("error"),
    error: Type.Optional(Type.String()),
    expected: Type.Optional(Type.String()),
});

const EVENT_SCHEMAS = {
    session_created: SessionCreatedEvent,
    join_success: JoinSuccessEvent,
    player_joined: PlayerJoinedEvent,
    game_ready: GameReadyEvent,
    game_started: GameStartedEvent,
    move_result: MoveResultEvent,
    board_display: BoardDisplayEvent,
    game_over: GameOverEvent,
    game_reset: GameResetEvent,
    error: ErrorEvent,
} as const;

export type ServerEventType = keyof typeof EVENT_SCHEMAS;

export type SessionCreated = Static<typeof SessionCreatedEvent>;
export type JoinSuccess = Static<typeof JoinSuccessEvent>;
export type PlayerJoined = Static<typeof PlayerJoinedEvent>;
export type GameReady = Static<typeof GameReadyEvent>;
export type GameStarted = Static<typeof GameStartedEvent>;
export type MoveResult = Static<typeof MoveResultEvent>;
export type BoardDisplay = Static<typeof BoardDisplayEvent>;
export type GameOver = Static<typeof GameOverEvent>;
export type GameReset = Static<typeof GameResetEvent>;
export type ServerError = Static<typeof ErrorEvent>;

export type ServerEvent =
    | SessionCreated
    | JoinSuccess
    | PlayerJoined
    | GameReady
    | GameStarted
    | MoveResult
    | BoardDisplay
    | GameOver
    | GameReset
    | ServerError;

export type DecodeResult =
    | { ok: true; event: ServerEvent }
    | { ok: false; reason: "invalid_json"; error: string }
    | { ok: false; reason: "not_an_object" }
    | { ok: false; reason: "unknown_type"; kind: string }
    | { ok: false; reason: "invalid_payload"; kind: ServerEventType; problems: string[] };

// === Serialization ===

export function serialize(cmd: ClientCommand): string {
    return JSON.stringify(cmd) + "\n";
}

export function isColor(value: unknown): value is Color {
    return value === "white" || value === "black";
}

export function isServerEventType(kind: string): kind is ServerEventType {
    return Object.hasOwn(EVENT_SCHEMAS, kind);
}

/**
 * Decode one framed line into a typed server event.
 * Never throws: every failure comes back as a result the caller can log.
 */
export function decodeServerEvent(raw: string): DecodeResult {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (err) {
        return { ok: false, reason: "invalid_json", error: err instanceof Error ? err.message : String(err) };
    }

    if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
        return { ok: false, reason: "not_an_object" };
    }

    const kind = "type" in parsed ? parsed.type : undefined;
    if (typeof kind !== "string" || !isServerEventType(kind)) {
        return { ok: false, reason: "unknown_type", kind: typeof kind === "string" ? kind : "unknown" };
    }

    const schema = EVENT_SCHEMAS[kind];
    if (Value.Check(schema, parsed)) {
        return { ok: true, event: parsed };
    }
    return { ok: false, reason: "invalid_payload", kind, problems: describeProblems(schema, parsed) };
}

/** Convert the server's strike fields to the client's move record. */
export function toMoveRecord(strike: Strike): MoveRecord {
    return {
        index: strike.strike_number,
        color: strike.color,
        piece: strike.piece,
        src: strike.case_src,
        dest: strike.case_dest,
        capture: strike.is_capture ?? false,
        capturedColor: strike.captured_color,
        capturedPiece: strike.captured_piece,
        castling: strike.is_castling ?? false,
        castlingKind: strike.castling_type,
        check: strike.is_check ?? false,
        checkmate: strike.is_checkmate ?? false,
        stalemate: strike.is_stalemate ?? false,
    };
}
