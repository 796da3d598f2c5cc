// src/report.ts
import { fieldLabel, formatFieldValue } from "./fields.js";
import type { CourseRecord, DiffResult, Grouped, UpdatedCourse } from "./types.js";

type Section<T> = {
  grouped: Grouped<T>;
  title: string;
  emoji: string;
  render: (key: string, entry: T) => string[];
};

const byCodeUnit = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

// 空文字の名前はそのまま出す
function courseLine(name: string | undefined, key: string): string {
  return `- ${name ?? "Unnamed"} (ID: ${key})`;
}

function renderCourse(key: string, c: Partial<CourseRecord>): string[] {
  return [courseLine(c.Name, key)];
}

function renderUpdate(key: string, u: UpdatedCourse): string[] {
  const lines = [courseLine(u.name, key)];
  for (const [field, { old, new: next }] of Object.entries(u.changes)) {
    lines.push(`    ${fieldLabel(field)}: ${formatFieldValue(field, old)} ◀️ ${formatFieldValue(field, next)}`);
  }
  return lines;
}

function renderSection<T>(department: string, { grouped, title, emoji, render }: Section<T>): string[] {
  const entries = grouped[department] ?? {};
  const keys = Object.keys(entries).sort(byCodeUnit);
  if (keys.length === 0) return [];

  const lines = [`${emoji} ${title}:`];
  for (const key of keys) {
    lines.push(...render(key, entries[key]), "");
  }
  return lines;
}

/** One message block per department that has at least one change. */
export function renderReport(diff: DiffResult): string[] {
  const departments = new Set([
    ...Object.keys(diff.added),
    ...Object.keys(diff.removed),
    ...Object.keys(diff.updated),
  ]);

  return [...departments].sort(byCodeUnit).map(department => [
    `🏛️ ${department}:`,
    ...renderSection(department, { grouped: diff.added, title: "Added Courses", emoji: "🟢", render: renderCourse }),
    ...renderSection(department, { grouped: diff.removed, title: "Removed Courses", emoji: "🔴", render: renderCourse }),
    ...renderSection(department, { grouped: diff.updated, title: "Updated Courses", emoji: "🟡", render: renderUpdate }),
  ].join("\n"));
}

export function renderTimeRange(oldTime: string, newTime: string): string {
  return `Time [${oldTime}] ➡️ [${newTime}]`;
}
