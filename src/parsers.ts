// src/parsers.ts
import type { CourseSession } from "./types.js";

export const UNDEFINED_VALUE = "تعریف نشده";

// 表示用の曜日名（土曜始まり）
export const WEEKDAYS = ["شنبه", "یکشنبه", "دوشنبه", "سه\u200Cشنبه", "چهارشنبه", "پنجشنبه", "جمعه"];

// 空白とZWNJを除いた曜日名 → 0..6
const DAY_OF_WEEK = new Map<string, number>([
  ["شنبه", 0],
  ["یکشنبه", 1],
  ["دوشنبه", 2],
  ["سهشنبه", 3],
  ["چهارشنبه", 4],
  ["پنجشنبه", 5],
  ["جمعه", 6],
]);

const SCHEDULE_SEGMENT = /([^\d]+) از (\d{1,2}:\d{1,2}) تا (\d{1,2}:\d{1,2})/g;
const EXAM_DATE_TIME = /(\S+)\s*(\d{2}:\d{2})/;
const DAY_JOINER = " و ";

/**
 * Pads "H:M" to "HH:MM". A single-digit minute gets a trailing zero,
 * so "9:5" becomes "09:50".
 */
export function normalizeTime(raw: string): string {
  const parts = raw.split(":");
  if (parts.length !== 2) return raw;
  let [h, m] = parts;
  if (h.length === 1) h = "0" + h;
  if (m.length === 1) m = m + "0";
  return `${h}:${m}`;
}

export function trimOrNull(s: string | null | undefined): string | null {
  if (s == null) return null;
  const t = s.trim();
  return t === "" ? null : t;
}

export function splitExam(text: string): { date: string | null; time: string | null } {
  const m = EXAM_DATE_TIME.exec(text ?? "");
  if (!m) return { date: null, time: null };
  return { date: trimOrNull(m[1]), time: trimOrNull(m[2]) };
}

export function dayOfWeek(name: string): number | undefined {
  return DAY_OF_WEEK.get(name.replace(/[\s\u200C]/g, ""));
}

export function parseWeeklySchedule(text: string): CourseSession[] {
  const sessions: CourseSession[] = [];
  for (const m of (text ?? "").matchAll(SCHEDULE_SEGMENT)) {
    const startTime = normalizeTime(m[2]);
    const endTime = normalizeTime(m[3]);
    for (const name of m[1].split(DAY_JOINER)) {
      const day = dayOfWeek(name.trim());
      // 不明な曜日は無視
      if (day === undefined) continue;
      sessions.push({ dayOfWeek: day, startTime, endTime });
    }
  }
  return sessions;
}

export function formatSessions(sessions: readonly CourseSession[]): string {
  if (sessions.length === 0) return UNDEFINED_VALUE;
  const dayName = (s: CourseSession) => WEEKDAYS[s.dayOfWeek] ?? String(s.dayOfWeek);

  const [first] = sessions;
  const uniform = sessions.every(s => s.startTime === first.startTime && s.endTime === first.endTime);
  if (uniform) {
    return sessions.map(dayName).join(DAY_JOINER) + ` از ${first.startTime} تا ${first.endTime}`;
  }
  return sessions.map(s => `${dayName(s)} از ${s.startTime} تا ${s.endTime}`).join("، ");
}

function toLatinDigits(s: string): string {
  return s
    .replace(/[۰-۹]/g, d => String(d.charCodeAt(0) - 0x06f0))
    .replace(/[٠-٩]/g, d => String(d.charCodeAt(0) - 0x0660));
}

export function isDigits(text: string): boolean {
  return /^[0-9۰-۹٠-٩]+$/.test(text);
}

export function parseInteger(text: string, fallback = 0): number {
  const t = toLatinDigits((text ?? "").trim());
  if (!/^[+-]?\d+$/.test(t)) return fallback;
  return Number.parseInt(t, 10);
}
