// src/diff.ts
import type { CourseRecord, DiffResult, FieldChange, Grouped, SnapshotFile } from "./types.js";
import { makeHash, stableStringify } from "./utils.js";

const UNKNOWN = "Unknown";

function departmentOf(record: Partial<CourseRecord>): string {
  return typeof record.Department === "string" ? record.Department : UNKNOWN;
}

function addTo<T>(grouped: Grouped<T>, department: string, key: string, value: T) {
  (grouped[department] ??= {})[key] = value;
}

/**
 * Field-level changes between two versions of one record. Fields missing
 * from either side are left out and logged.
 */
export function diffFields(key: string, before: CourseRecord, after: CourseRecord): Record<string, FieldChange> {
  const prev = new Map<string, unknown>(Object.entries(before));
  const changes: Record<string, FieldChange> = {};

  for (const [field, value] of Object.entries(after)) {
    if (!prev.has(field)) {
      console.warn(`Field ${field} of ${key} is missing from the previous snapshot; skipped`);
      continue;
    }
    const old = prev.get(field);
    prev.delete(field);
    if (stableStringify(old) !== stableStringify(value)) {
      changes[field] = { old, new: value };
    }
  }
  for (const field of prev.keys()) {
    console.warn(`Field ${field} of ${key} is missing from the current snapshot; skipped`);
  }
  return changes;
}

export function compareSnapshots(prev: SnapshotFile, curr: SnapshotFile): DiffResult {
  const added: Grouped<CourseRecord> = {};
  const removed: Grouped<CourseRecord> = {};
  const updated: DiffResult["updated"] = {};

  for (const [key, c] of Object.entries(curr)) {
    const p = Object.hasOwn(prev, key) ? prev[key] : undefined;
    if (!p) {
      addTo(added, departmentOf(c), key, c);
      continue;
    }
    if (makeHash(p) === makeHash(c)) continue;

    const changes = diffFields(key, p, c);
    if (Object.keys(changes).length === 0) continue;
    addTo(updated, departmentOf(c), key, {
      name: typeof c.Name === "string" ? c.Name : UNKNOWN,
      changes,
    });
  }
  for (const [key, p] of Object.entries(prev)) {
    if (!Object.hasOwn(curr, key)) addTo(removed, departmentOf(p), key, p);
  }
  return { added, removed, updated };
}

export function countDiff(diff: DiffResult): { added: number; removed: number; updated: number } {
  const count = (g: Grouped<unknown>) => Object.values(g).reduce((n, byKey) => n + Object.keys(byKey).length, 0);
  return { added: count(diff.added), removed: count(diff.removed), updated: count(diff.updated) };
}

export function isEmptyDiff(diff: DiffResult): boolean {
  const { added, removed, updated } = countDiff(diff);
  return added + removed + updated === 0;
}
