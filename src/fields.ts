// src/fields.ts
import { fromCourseRecord } from "./course.js";
import { formatSessions, UNDEFINED_VALUE } from "./parsers.js";
import type { CourseRecord } from "./types.js";

type FieldName = keyof CourseRecord;

const LABELS: Record<FieldName, string> = {
  Name: "🪧 نام درس",
  Lecturer: "👨‍🏫 استاد",
  Capacity: "📊 ظرفیت",
  Registered: "📈 ثبت نامی",
  ExamDate: "📅 تاریخ آزمون",
  ExamTime: "🕒 ساعت آزمون",
  Sessions: "🗓️ برنامه هفتگی",
  Info: "💬 توضیحات",
  // ほぼ変わらない項目
  Code: "کد درس",
  Group: "گروه درس",
  Units: "واحد",
  Year: "سال",
  Semester: "ترم",
  Department: "دانشکده",
  DepartmentCode: "کد دانشکده",
  Grade: "مقطع",
};

function isFieldName(field: string): field is FieldName {
  return Object.hasOwn(LABELS, field);
}

export function fieldLabel(field: string): string {
  return isFieldName(field) ? LABELS[field] : field;
}

function formatPlain(value: unknown): string {
  if (value == null || value === "") return UNDEFINED_VALUE;
  return typeof value === "object" ? JSON.stringify(value) : String(value);
}

function formatSessionRecords(value: unknown): string {
  if (!Array.isArray(value)) return formatPlain(value);
  return formatSessions(fromCourseRecord({ Sessions: value }).sessions);
}

const FORMATTERS: Partial<Record<FieldName, (value: unknown) => string>> = {
  Sessions: formatSessionRecords,
};

export function formatFieldValue(field: string, value: unknown): string {
  const format = isFieldName(field) ? FORMATTERS[field] : undefined;
  return (format ?? formatPlain)(value);
}
