// src/utils.ts
import crypto from "node:crypto";
import { setTimeout as delay } from "node:timers/promises";

export const sleep = (ms: number, signal?: AbortSignal) => delay(ms, undefined, { signal });

export function normalizeText(s: string): string {
  return (s ?? "")
    .replace(/\r?\n+/g, " ")
    .replace(/\s+/g, " ")
    .replace(/\u00A0/g, " ")
    .trim();
}

// キー順に依存しないJSON文字列。配列の順序はそのまま
export function stableStringify(value: unknown): string {
  if (value === undefined) return "null";
  if (value === null || typeof value !== "object") return JSON.stringify(value);
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(",")}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
  return `{${entries.join(",")}}`;
}

export function makeHash(value: unknown): string {
  return crypto.createHash("sha256").update(stableStringify(value)).digest("hex");
}

export function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** "YYYY-MM-DD HH:mm:ss" in local time. */
export function formatTimestamp(d: Date, dateSep = "-", timeSep = ":", join = " "): string {
  const date = [d.getFullYear(), pad2(d.getMonth() + 1), pad2(d.getDate())].join(dateSep);
  const time = [pad2(d.getHours()), pad2(d.getMinutes()), pad2(d.getSeconds())].join(timeSep);
  return `${date}${join}${time}`;
}

export function escapeHtml(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}
