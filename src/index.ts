// src/index.ts
export * from "./types.js";
export * from "./parsers.js";
export * from "./course.js";
export * from "./snapshot.js";
export * from "./extract.js";
export * from "./diff.js";
export * from "./fields.js";
export * from "./report.js";
