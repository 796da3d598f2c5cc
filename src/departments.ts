// src/departments.ts
import fs from "node:fs";

export type Department = {
  code: number;
  /** Storage name, underscores in place of spaces. */
  name: string;
};

const DEPARTMENTS_JSON = new URL("../data/departments.json", import.meta.url);

export function parseDepartments(raw: Record<string, unknown>): Department[] {
  return Object.entries(raw)
    .filter((entry): entry is [string, string] => typeof entry[1] === "string" && /^\d+$/.test(entry[0]))
    .map(([code, name]) => ({ code: Number(code), name }))
    .sort((a, b) => a.code - b.code);
}

/** Watched departments; `only` limits them to the given codes. */
export function loadDepartments(only?: readonly number[], file: string | URL = DEPARTMENTS_JSON): Department[] {
  const all = parseDepartments(JSON.parse(fs.readFileSync(file, "utf-8")));
  if (!only || only.length === 0) return all;

  const unknown = only.filter(code => !all.some(d => d.code === code));
  if (unknown.length) console.warn(`Unknown department codes ignored: ${unknown.join(", ")}`);
  return all.filter(d => only.includes(d.code));
}
