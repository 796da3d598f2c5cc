// src/extract.ts
import * as cheerio from "cheerio";
import { buildCourse, createCourseRow, type CourseRow } from "./course.js";
import { isDigits, parseInteger, parseWeeklySchedule, splitExam, trimOrNull } from "./parsers.js";
import { putCourse } from "./snapshot.js";
import type { Grade, Snapshot } from "./types.js";
import { normalizeText } from "./utils.js";

export type TermInfo = { year: number; semester: number };

export type DepartmentContext = {
  departmentCode: number;
  /** Storage name, underscores in place of spaces. */
  departmentName: string;
};

const TERM_HEADER = /نیمسال (\S+) (\d{4})-(\d{4})/;

const SEMESTERS = new Map([
  ["اول", 1],
  ["دوم", 2],
]);

export function parseTermHeader(text: string): TermInfo {
  const m = TERM_HEADER.exec(text);
  if (!m) return { year: 0, semester: 0 };
  // 学年は "YYYY-YYYY" の後ろの年
  return { year: Number(m[3]), semester: SEMESTERS.get(m[1]) ?? 3 };
}

export function detectGrade(rowText: string): Grade {
  if (rowText.includes("کارشناسی ارشد")) return "ms";
  if (rowText.includes("دکترا")) return "phd";
  return "bs";
}

/**
 * Maps one table row (cell texts in column order) to course fields.
 * Returns null for header and separator rows, recognised by a first cell
 * that is not a plain number.
 *
 * Columns: 0 code, 1 group, 2 units, 3 name, 5 capacity, 6 registered,
 * 7 lecturer, 8 exam date/time, 9 weekly schedule, 11 info.
 */
export function parseCourseRow(cells: readonly string[]): CourseRow | null {
  if (cells.length === 0 || !isDigits(cells[0])) return null;

  const row = createCourseRow();

  cells.forEach((text, i) => {
    switch (i) {
      case 0: row.code = text; break;
      case 1: row.group = parseInteger(text); break;
      case 2: row.units = parseInteger(text); break;
      case 3: row.name = text; break;
      case 5: row.capacity = parseInteger(text); break;
      case 6: row.registered = parseInteger(text); break;
      case 7: row.lecturer = text; break;
      case 8: {
        const exam = splitExam(text);
        row.examDate = exam.date;
        row.examTime = exam.time;
        break;
      }
      case 9: row.sessions = parseWeeklySchedule(text); break;
      case 11: row.info = trimOrNull(text); break;
    }
  });
  return row;
}

export function loadDocument(html: string): cheerio.CheerioAPI {
  return cheerio.load(html);
}

/**
 * Extracts every course row of one department page into `snapshot`.
 * Returns the number of rows extracted (including overwritten keys).
 */
export function extractCourses($: cheerio.CheerioAPI, ctx: DepartmentContext, snapshot: Snapshot): number {
  const headerText = normalizeText($("td.header[colspan='13']").first().text());
  const { year, semester } = parseTermHeader(headerText);

  let count = 0;
  $(".contentTable").each((_, table) => {
    const firstRow = $(table).find("tbody tr").first();
    const levelText = firstRow.find("td").map((_, td) => normalizeText($(td).text())).get().join(" ");
    const grade = detectGrade(levelText);

    $(table).find("tr").each((_, tr) => {
      const cells = $(tr).find("td").map((_, td) => normalizeText($(td).text())).get();
      const row = parseCourseRow(cells);
      if (!row) return;

      putCourse(snapshot, buildCourse(row, {
        department: ctx.departmentName,
        departmentCode: ctx.departmentCode,
        grade,
        year,
        semester,
      }));
      count++;
    });
  });
  return count;
}
