/**
 * Console View
 *
 * Text front end: prints the state-aware menu and reads commands from a
 * line-oriented input stream. Menu layout and input parsing are plain
 * functions so they can be checked without a terminal.
 */

import * as readline from "node:readline";
import type { BoardData, Color } from "../protocol.js";
import { ClientState } from "../state.js";
import type { MenuSnapshot, UserCommand, View } from "../view.js";

const RULE = "=".repeat(60);
const THIN_RULE = "-".repeat(60);

const SQUARE_PAIR = /^([a-h][1-8])\s*[-\s]\s*([a-h][1-8])$|^([a-h][1-8])([a-h][1-8])$/i;

type ConnectedOption =
    | { label: string; command: { kind: "single" } }
    | { label: string; command: { kind: "join"; color: Color } }
    | { label: string; command: { kind: "upload" } };

/** Options offered while CONNECTED, numbered from 1 in this order. */
export function connectedOptions(snapshot: MenuSnapshot): ConnectedOption[] {
    const options: ConnectedOption[] = [];
    const whiteFree = !snapshot.whiteJoined;
    const blackFree = !snapshot.blackJoined;

    if (whiteFree && blackFree) {
        options.push({ label: "Single Player Game (play both sides)", command: { kind: "single" } });
    }
    if (whiteFree) {
        options.push({ label: "Join as White Player", command: { kind: "join", color: "white" } });
    }
    if (blackFree) {
        options.push({ label: "Join as Black Player", command: { kind: "join", color: "black" } });
    }
    options.push({ label: "Upload Game File (<n> <path>)", command: { kind: "upload" } });
    return options;
}

export function formatMenu(snapshot: MenuSnapshot): string {
    const lines: string[] = ["", RULE, "CHESS GAME CLIENT", RULE, "", `Status: ${snapshot.state}`];

    if (snapshot.state === ClientState.CONNECTED || snapshot.state === ClientState.JOINED) {
        lines.push(`White player: ${snapshot.whiteJoined ? "Joined" : "Waiting..."}`);
        lines.push(`Black player: ${snapshot.blackJoined ? "Joined" : "Waiting..."}`);
    }
    if (snapshot.playerNumber === 1) {
        lines.push("You are playing both sides");
    } else if (snapshot.playerColor) {
        lines.push(`You are playing as: ${snapshot.playerColor.toUpperCase()}`);
    }
    if (snapshot.currentTurn !== null && snapshot.moveCount !== null) {
        lines.push("", `Turn: ${snapshot.currentTurn}`, `Move count: ${snapshot.moveCount}`);
    }

    lines.push("", THIN_RULE, "MENU OPTIONS:", THIN_RULE);

    switch (snapshot.state) {
        case ClientState.DISCONNECTED:
            lines.push("Waiting for server...", "Q. Quit");
            break;
        case ClientState.CONNECTED:
            connectedOptions(snapshot).forEach((opt, i) => lines.push(`${i + 1}. ${opt.label}`));
            lines.push("Q. Quit");
            break;
        case ClientState.JOINED:
            if (snapshot.whiteJoined && snapshot.blackJoined) {
                lines.push("1. Start Game");
            } else {
                lines.push("Waiting for opponent to join...");
            }
            lines.push("Q. Quit");
            break;
        case ClientState.PLAYING:
            lines.push(
                "Enter a move (e.g. e2-e4), or:",
                "  :d             => display board",
                "  :e             => end game",
                "  :f <file name> => upload game file",
                "  :q             => quit",
            );
            break;
        case ClientState.GAME_OVER:
            lines.push("1. Restart Game", "  :d => display board", "Q. Quit");
            break;
    }

    lines.push(RULE);
    return lines.join("\n");
}

/** Map one line of user input to a command, using the same numbering as formatMenu. */
export function parseInput(line: string, snapshot: MenuSnapshot): UserCommand {
    const input = line.trim();
    const lower = input.toLowerCase();

    if (input === "") return { kind: "refresh" };
    if (lower === "q" || lower === "quit" || lower === "exit" || lower === ":q") return { kind: "quit" };

    const [head = "", ...rest] = input.split(/\s+/);
    const arg = rest.join(" ");

    if (head === ":f") {
        return arg
            ? { kind: "upload", path: arg }
            : { kind: "invalid", input, reason: "Usage: :f <file name>" };
    }

    switch (snapshot.state) {
        case ClientState.DISCONNECTED:
            return { kind: "invalid", input, reason: "Not connected to server yet" };

        case ClientState.CONNECTED: {
            const option = connectedOptions(snapshot)[Number(head) - 1];
            if (!/^\d+$/.test(head) || !option) {
                return { kind: "invalid", input, reason: "Invalid choice" };
            }
            if (option.command.kind === "upload") {
                return arg
                    ? { kind: "upload", path: arg }
                    : { kind: "invalid", input, reason: `Usage: ${head} <file name>` };
            }
            return option.command;
        }

        case ClientState.JOINED:
            return input === "1" ? { kind: "start" } : { kind: "invalid", input, reason: "Invalid choice" };

        case ClientState.PLAYING: {
            if (lower === ":d") return { kind: "board" };
            if (lower === ":e") return { kind: "end" };
            if (input.startsWith(":")) return { kind: "invalid", input, reason: `Unknown command: ${head}` };
            const squares = SQUARE_PAIR.exec(lower);
            if (squares) {
                const from = squares[1] ?? squares[3] ?? "";
                const to = squares[2] ?? squares[4] ?? "";
                return { kind: "move", from, to };
            }
            return { kind: "move_text", text: input };
        }

        case ClientState.GAME_OVER:
            if (input === "1") return { kind: "restart" };
            if (lower === ":d") return { kind: "board" };
            return { kind: "invalid", input, reason: "Game over. Type 'q' to exit." };
    }
}

export function formatBoard(board: BoardData): string {
    if (typeof board === "string") return board;
    const fen = board["fen"];
    if (typeof fen === "string") return `FEN: ${fen}`;
    return JSON.stringify(board, null, 2);
}

export interface ConsoleViewOptions {
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
}

export class ConsoleView implements View {
    private readonly input: NodeJS.ReadableStream;
    private readonly output: NodeJS.WritableStream;
    private rl: readline.Interface | null = null;
    /** Lines read while no prompt was waiting, oldest first */
    private readonly pending: string[] = [];
    private waiter: ((line: string | null) => void) | null = null;
    private inputEnded = false;

    constructor(options: ConsoleViewOptions = {}) {
        this.input = options.input ?? process.stdin;
        this.output = options.output ?? process.stdout;
    }

    displayWelcome(): void {
        this.print(`${RULE}\nWelcome to the chess client\n${RULE}`);
    }

    displayBoard(board: BoardData): void {
        this.print(`\n${formatBoard(board)}`);
    }

    displayGameOver(result: string): void {
        this.print(`\n=== GAME OVER: ${result} ===`);
    }

    displayMenu(snapshot: MenuSnapshot): void {
        this.print(formatMenu(snapshot));
    }

    displayInfo(message: string): void {
        this.print(message);
    }

    displayWarning(message: string): void {
        this.print(`Warning: ${message}`);
    }

    displayError(message: string): void {
        this.print(`Error: ${message}`);
    }

    displaySuccess(message: string): void {
        this.print(`✓ ${message}`);
    }

    async confirmAction(prompt: string): Promise<boolean> {
        const answer = await this.ask(`${prompt} (y/n): `);
        return answer !== null && /^y(es)?$/i.test(answer.trim());
    }

    async waitForInput(snapshot: MenuSnapshot): Promise<UserCommand> {
        const line = await this.ask("Enter choice: ");
        // End of input: nobody is left to confirm anything
        if (line === null) return { kind: "quit", force: true };
        return parseInput(line, snapshot);
    }

    cleanup(): void {
        // The console keeps nothing per game; input stays open across resets
    }

    /** Stop reading. An open prompt and every later one answer end of input. */
    close(): void {
        this.inputEnded = true;
        this.pending.length = 0;
        this.rl?.close();
        this.settle(null);
    }

    private print(text: string): void {
        this.output.write(`${text}\n`);
    }

    private reader(): readline.Interface {
        if (this.rl) return this.rl;
        const rl = readline.createInterface({ input: this.input, terminal: false });
        rl.on("line", (line: string) => {
            if (this.waiter) {
                this.settle(line);
            } else {
                this.pending.push(line);
            }
        });
        rl.once("close", () => {
            this.inputEnded = true;
            this.settle(null);
        });
        this.rl = rl;
        return rl;
    }

    private settle(line: string | null): void {
        const waiter = this.waiter;
        this.waiter = null;
        waiter?.(line);
    }

    private ask(prompt: string): Promise<string | null> {
        if (!this.inputEnded) this.reader();
        this.output.write(prompt);

        const queued = this.pending.shift();
        if (queued !== undefined) return Promise.resolve(queued);
        if (this.inputEnded) return Promise.resolve(null);
        return new Promise((resolve) => {
            this.waiter = resolve;
        });
    }
}
