import type { TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

/** Format seconds since game start as HH:MM:SS. */
export function formatTimestamp(seconds: number): string {
    const total = Math.max(0, Math.floor(seconds));
    const hours = Math.floor(total / 3600);
    const minutes = Math.floor((total % 3600) / 60);
    const secs = total % 60;
    return [hours, minutes, secs].map((n) => String(n).padStart(2, "0")).join(":");
}

/** Flatten schema validation errors into "path: message" lines. */
export function describeProblems(schema: TSchema, value: unknown): string[] {
    return [...Value.Errors(schema, value)].map((e) => `${e.path || "/"}: ${e.message}`);
}
