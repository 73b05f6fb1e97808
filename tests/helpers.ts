import * as os from "node:os";
import * as path from "node:path";
import type { ClientLogger, LogMeta } from "../src/logger.js";
import type { BoardData } from "../src/protocol.js";
import type { MenuSnapshot, UserCommand, View } from "../src/view.js";

export interface LogEntry {
    level: "error" | "warn" | "info" | "debug";
    message: string;
    meta?: LogMeta;
}

/** Logger that keeps every entry in memory. */
export class RecordingLogger implements ClientLogger {
    readonly entries: LogEntry[] = [];

    error(message: string, meta?: LogMeta): void {
        this.entries.push({ level: "error", message, meta });
    }

    warn(message: string, meta?: LogMeta): void {
        this.entries.push({ level: "warn", message, meta });
    }

    info(message: string, meta?: LogMeta): void {
        this.entries.push({ level: "info", message, meta });
    }

    debug(message: string, meta?: LogMeta): void {
        this.entries.push({ level: "debug", message, meta });
    }

    messages(level: LogEntry["level"]): string[] {
        return this.entries.filter((e) => e.level === level).map((e) => e.message);
    }
}

export type ViewCall =
    | { call: "welcome" }
    | { call: "board"; board: BoardData }
    | { call: "gameOver"; result: string }
    | { call: "menu"; snapshot: MenuSnapshot }
    | { call: "info"; message: string }
    | { call: "warning"; message: string }
    | { call: "error"; message: string }
    | { call: "success"; message: string }
    | { call: "confirm"; prompt: string }
    | { call: "cleanup" }
    | { call: "close" };

/**
 * View that records every call. Confirmations answer from `confirmAnswers`
 * (default yes) and input comes from `inputs`, then "quit" once it runs out.
 */
export class RecordingView implements View {
    readonly calls: ViewCall[] = [];
    confirmAnswers: boolean[] = [];
    inputs: UserCommand[] = [];
    /** Called before each input is handed out, with the snapshot it was asked for. */
    onInput: ((snapshot: MenuSnapshot) => void | Promise<void>) | null = null;

    displayWelcome(): void {
        this.calls.push({ call: "welcome" });
    }

    displayBoard(board: BoardData): void {
        this.calls.push({ call: "board", board });
    }

    displayGameOver(result: string): void {
        this.calls.push({ call: "gameOver", result });
    }

    displayMenu(snapshot: MenuSnapshot): void {
        this.calls.push({ call: "menu", snapshot });
    }

    displayInfo(message: string): void {
        this.calls.push({ call: "info", message });
    }

    displayWarning(message: string): void {
        this.calls.push({ call: "warning", message });
    }

    displayError(message: string): void {
        this.calls.push({ call: "error", message });
    }

    displaySuccess(message: string): void {
        this.calls.push({ call: "success", message });
    }

    async confirmAction(prompt: string): Promise<boolean> {
        this.calls.push({ call: "confirm", prompt });
        return this.confirmAnswers.shift() ?? true;
    }

    async waitForInput(snapshot: MenuSnapshot): Promise<UserCommand> {
        await this.onInput?.(snapshot);
        return this.inputs.shift() ?? { kind: "quit", force: true };
    }

    cleanup(): void {
        this.calls.push({ call: "cleanup" });
    }

    close(): void {
        this.calls.push({ call: "close" });
    }

    /** Calls other than menu redraws. */
    get messages(): ViewCall[] {
        return this.calls.filter((c) => c.call !== "menu");
    }

    menus(): MenuSnapshot[] {
        const out: MenuSnapshot[] = [];
        for (const c of this.calls) {
            if (c.call === "menu") out.push(c.snapshot);
        }
        return out;
    }

    clear(): void {
        this.calls.length = 0;
    }
}

export function tmpSocketPath(name: string): string {
    return path.join(os.tmpdir(), `${name}-${process.pid}-${Date.now()}.sock`);
}

export function wait(ms: number): Promise<void> {
    return new Promise((r) => setTimeout(r, ms));
}

/** Poll until `check` passes or `timeoutMs` runs out. */
export async function waitFor(check: () => boolean, timeoutMs = 2000): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (!check()) {
        if (Date.now() > deadline) {
            throw new Error("Timed out waiting for condition");
        }
        await wait(5);
    }
}
