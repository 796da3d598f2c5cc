// src/snapshot.ts
import { courseKey, fromCourseRecord, toCourseRecord } from "./course.js";
import type { Course, Snapshot, SnapshotFile } from "./types.js";

export function createSnapshot(): Snapshot {
  return new Map();
}

// 同じキーは後勝ち
export function putCourse(snapshot: Snapshot, course: Course): string {
  const key = courseKey(course);
  snapshot.set(key, course);
  return key;
}

export function toSnapshotFile(snapshot: Snapshot): SnapshotFile {
  const out: SnapshotFile = {};
  for (const [key, course] of snapshot.entries()) {
    out[key] = toCourseRecord(course);
  }
  return out;
}

export function fromSnapshotFile(file: SnapshotFile): Snapshot {
  return new Map(Object.entries(file).map(([key, record]) => [key, fromCourseRecord(record)]));
}
