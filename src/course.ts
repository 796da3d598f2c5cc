// src/course.ts
import { parseInteger } from "./parsers.js";
import type { Course, CourseRecord, CourseSession, Grade, SessionRecord } from "./types.js";

/** Context stamped on every row of one department page. */
export type CourseContext = {
  department: string;
  departmentCode: number;
  grade: Grade;
  year: number;
  semester: number;
};

export type CourseRow = Omit<Course, keyof CourseContext>;

export function createCourseRow(): CourseRow {
  return {
    code: "",
    group: 0,
    name: "",
    lecturer: "",
    capacity: 0,
    registered: 0,
    units: 0,
    examDate: null,
    examTime: null,
    sessions: [],
    info: null,
  };
}

export function createCourse(fields: Partial<Course> = {}): Course {
  return {
    ...createCourseRow(),
    department: "",
    departmentCode: 0,
    grade: "bs",
    year: 0,
    semester: 0,
    ...fields,
  };
}

export function humanizeDepartmentName(name: string): string {
  return name.replace(/_/g, " ");
}

export function buildCourse(row: CourseRow, context: CourseContext): Course {
  return { ...row, ...context, department: humanizeDepartmentName(context.department) };
}

export function courseKey(course: Pick<Course, "code" | "group">): string {
  return `${course.code}-${course.group}`;
}

export function toCourseRecord(c: Course): CourseRecord {
  return {
    Code: c.code,
    Group: c.group,
    Name: c.name,
    Lecturer: c.lecturer,
    Capacity: c.capacity,
    Registered: c.registered,
    Units: c.units,
    ExamDate: c.examDate,
    ExamTime: c.examTime,
    Sessions: c.sessions.map(s => ({ day_of_week: s.dayOfWeek, start_time: s.startTime, end_time: s.endTime })),
    Info: c.info,
    Department: c.department,
    DepartmentCode: c.departmentCode,
    Grade: c.grade,
    Year: c.year,
    Semester: c.semester,
  };
}

// 古いファイルや手で編集されたファイルも読めるよう、型が合わない値は既定値にする
const str = (v: unknown, fallback = ""): string => (typeof v === "string" ? v : fallback);
const optStr = (v: unknown): string | null => (typeof v === "string" ? v : null);
const int = (v: unknown): number => {
  if (typeof v === "number") return Number.isInteger(v) ? v : 0;
  return typeof v === "string" ? parseInteger(v) : 0;
};

function toGrade(v: unknown): Grade {
  return v === "ms" || v === "phd" ? v : "bs";
}

function toSession(s: Partial<SessionRecord> | null | undefined): CourseSession {
  return {
    dayOfWeek: int(s?.day_of_week),
    startTime: str(s?.start_time),
    endTime: str(s?.end_time),
  };
}

export function fromCourseRecord(r: Readonly<Partial<Record<keyof CourseRecord, unknown>>>): Course {
  return {
    code: str(r.Code),
    group: int(r.Group),
    name: str(r.Name),
    lecturer: str(r.Lecturer),
    capacity: int(r.Capacity),
    registered: int(r.Registered),
    units: int(r.Units),
    examDate: optStr(r.ExamDate),
    examTime: optStr(r.ExamTime),
    sessions: Array.isArray(r.Sessions) ? r.Sessions.map(toSession) : [],
    info: optStr(r.Info),
    department: str(r.Department),
    departmentCode: int(r.DepartmentCode),
    grade: toGrade(r.Grade),
    year: int(r.Year),
    semester: int(r.Semester),
  };
}
