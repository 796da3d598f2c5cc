// src/storage.ts
import fs from "node:fs";
import path from "node:path";
import { fromCourseRecord, toCourseRecord } from "./course.js";
import type { SnapshotFile } from "./types.js";
import { formatTimestamp } from "./utils.js";

export function previousPath(filePath: string): string {
  const ext = path.extname(filePath);
  return `${filePath.slice(0, filePath.length - ext.length)} - old${ext || ".json"}`;
}

function isObject(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

export function loadSnapshot(filePath: string): SnapshotFile {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (e) {
    if (!isNotFound(e)) throw e;
    console.warn(`Snapshot not found: ${filePath}, starting from an empty one`);
    return {};
  }
  const data: unknown = JSON.parse(raw);
  if (!isObject(data)) {
    throw new Error(`Snapshot ${filePath} is not a JSON object`);
  }

  // 型の違う値は既定値に揃え、スクレイプ直後のレコードと同じ形にする
  const out: SnapshotFile = {};
  for (const [key, record] of Object.entries(data)) {
    if (!isObject(record)) {
      console.warn(`Record ${key} in ${filePath} is not an object; skipped`);
      continue;
    }
    out[key] = toCourseRecord(fromCourseRecord(record));
  }
  return out;
}

function writeJson(filePath: string, data: SnapshotFile) {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2), "utf-8");
}

/**
 * Writes the current snapshot. An existing file is kept as "<name> - old.json"
 * and a timestamped copy goes to `archiveDir`.
 */
export function saveSnapshot(filePath: string, data: SnapshotFile, opts: { archiveDir?: string; now?: Date } = {}) {
  if (fs.existsSync(filePath)) {
    const old = previousPath(filePath);
    fs.rmSync(old, { force: true });
    fs.renameSync(filePath, old);
  }

  if (opts.archiveDir) {
    const archiveFile = path.join(opts.archiveDir, `${formatTimestamp(opts.now ?? new Date(), "-", "-", "_")}.json`);
    try {
      writeJson(archiveFile, data);
      console.log(`Archived snapshot saved as ${archiveFile}`);
    } catch (e) {
      console.error("Failed to save archive snapshot:", e);
    }
  }

  writeJson(filePath, data);
  console.log(`Courses data saved to ${filePath}`);
}

export function fileTime(filePath: string): string {
  try {
    return formatTimestamp(fs.statSync(filePath).mtime);
  } catch (e) {
    if (!isNotFound(e)) throw e;
    return "N/A (file not found)";
  }
}
