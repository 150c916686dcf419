import { randomUUID } from "crypto";
import type { JsonValue, Metadata } from "@shared/schema";

export const generateId = (): string => randomUUID();

let lastIssued = 0;

/**
 * Wall-clock ISO timestamp that never repeats or goes backwards within the
 * process, so two writes in the same millisecond still order correctly.
 */
export function monotonicNow(): string {
  const now = Date.now();
  lastIssued = now > lastIssued ? now : lastIssued + 1;
  return new Date(lastIssued).toISOString();
}

export function toIsoString(value: Date | string): string;
export function toIsoString(value: Date | string | null | undefined): string | null;
export function toIsoString(value: Date | string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? value : parsed.toISOString();
}

export function toNumberOrNull(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const num = typeof value === "number" ? value : Number(value);
  return Number.isFinite(num) ? num : null;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * List columns arrive as JSON text (embedded) or already-decoded arrays (jsonb).
 * Anything absent or unreadable becomes [].
 */
export function decodeList(value: unknown): string[] {
  const decoded = typeof value === "string" ? parseJson(value) : value;
  return isStringArray(decoded) ? decoded : [];
}

export function encodeList(list: string[] | null | undefined): string {
  return JSON.stringify(list ?? []);
}

function isMetadata(value: unknown): value is Metadata {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function decodeMetadata(value: unknown): Metadata | null {
  const decoded = typeof value === "string" ? parseJson(value) : value;
  return isMetadata(decoded) ? decoded : null;
}

export function encodeJson(value: JsonValue | Metadata | null | undefined): string | null {
  return value === null || value === undefined ? null : JSON.stringify(value);
}

export function decodeJson(value: unknown): JsonValue | null {
  const decoded = typeof value === "string" ? parseJson(value) : value;
  return decoded === undefined ? null : toJsonValue(decoded);
}

function toJsonValue(value: unknown): JsonValue | null {
  if (value === null) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
  if (Array.isArray(value)) return value.map((item) => toJsonValue(item));
  if (typeof value === "object") {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = toJsonValue(entry);
    }
    return result;
  }
  return null;
}

/** `[00:00Z, next 00:00Z)` of the UTC day containing `now`. */
export function utcDayRange(now: Date): { start: string; end: string } {
  const start = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
  const end = new Date(start.getTime() + 24 * 60 * 60 * 1000);
  return { start: start.toISOString(), end: end.toISOString() };
}

export function daysBefore(now: Date, days: number): string {
  return new Date(now.getTime() - days * 24 * 60 * 60 * 1000).toISOString();
}

/** Escapes LIKE wildcards; queries pair this with `ESCAPE '\'`. */
export function likePattern(text: string): string {
  const escaped = text.toLowerCase().replace(/[\\%_]/g, (ch) => `\\${ch}`);
  return `%${escaped}%`;
}

export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  if (typeof error !== "object" || error === null) return false;
  if ("code" in error && typeof error.code === "string" && codes.includes(error.code)) return true;
  return "cause" in error && error.cause !== error && hasErrorCode(error.cause, ...codes);
}
