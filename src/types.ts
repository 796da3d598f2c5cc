// src/types.ts
export type Grade = "bs" | "ms" | "phd";

export type CourseSession = {
  readonly dayOfWeek: number;
  readonly startTime: string;
  readonly endTime: string;
};

export type Course = {
  code: string;
  group: number;
  name: string;
  lecturer: string;
  capacity: number;
  registered: number;
  units: number;
  examDate: string | null;
  examTime: string | null;
  sessions: CourseSession[];
  info: string | null;
  department: string;
  departmentCode: number;
  grade: Grade;
  year: number;
  semester: number;
};

export type Snapshot = Map<string, Course>;

// 保存形式（JSON）。フィールド名は既存のアーカイブと互換
export type SessionRecord = {
  day_of_week: number;
  start_time: string;
  end_time: string;
};

export type CourseRecord = {
  Code: string;
  Group: number;
  Name: string;
  Lecturer: string;
  Capacity: number;
  Registered: number;
  Units: number;
  ExamDate: string | null;
  ExamTime: string | null;
  Sessions: SessionRecord[];
  Info: string | null;
  Department: string;
  DepartmentCode: number;
  Grade: string;
  Year: number;
  Semester: number;
};

export type SnapshotFile = Record<string, CourseRecord>;

export type FieldChange = {
  old: unknown;
  new: unknown;
};

export type UpdatedCourse = {
  name: string;
  changes: Record<string, FieldChange>;
};

export type Grouped<T> = Record<string, Record<string, T>>;

export type DiffResult = {
  added: Grouped<CourseRecord>;
  removed: Grouped<CourseRecord>;
  updated: Grouped<UpdatedCourse>;
};
