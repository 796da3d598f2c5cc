// ── Tests: parsers.ts ─────────────────────────────────────────────────────────

import { describe, it, expect } from "vitest";
import {
  formatSessions,
  isDigits,
  normalizeTime,
  parseInteger,
  parseWeeklySchedule,
  splitExam,
  trimOrNull,
} from "../parsers.js";

// ── normalizeTime ─────────────────────────────────────────────────────────────

describe("normalizeTime", () => {
  it("pads the hour on the left and the minute on the right", () => {
    expect(normalizeTime("9:5")).toBe("09:50");
  });

  it("leaves two-digit parts alone", () => {
    expect(normalizeTime("10:30")).toBe("10:30");
  });

  it("pads only the hour when the minute already has two digits", () => {
    expect(normalizeTime("8:15")).toBe("08:15");
  });

  it("returns input that is not H:M unchanged", () => {
    expect(normalizeTime("1030")).toBe("1030");
    expect(normalizeTime("1:2:3")).toBe("1:2:3");
  });
});

// ── splitExam ─────────────────────────────────────────────────────────────────

describe("splitExam", () => {
  it("splits a date and an HH:MM time", () => {
    expect(splitExam("1403/10/12 14:00")).toEqual({ date: "1403/10/12", time: "14:00" });
  });

  it("accepts a date glued to the time", () => {
    expect(splitExam("1403/10/12-09:30")).toEqual({ date: "1403/10/12-", time: "09:30" });
  });

  it("returns nulls when there is no time", () => {
    expect(splitExam("no time here")).toEqual({ date: null, time: null });
    expect(splitExam("")).toEqual({ date: null, time: null });
  });
});

describe("trimOrNull", () => {
  it("turns blank strings into null", () => {
    expect(trimOrNull("  ")).toBeNull();
    expect(trimOrNull(null)).toBeNull();
    expect(trimOrNull(" notes ")).toBe("notes");
  });
});

// ── parseWeeklySchedule ───────────────────────────────────────────────────────

describe("parseWeeklySchedule", () => {
  it("emits one session per day of a joined day list", () => {
    expect(parseWeeklySchedule("شنبه و دوشنبه از 9:0 تا 10:30")).toEqual([
      { dayOfWeek: 0, startTime: "09:00", endTime: "10:30" },
      { dayOfWeek: 2, startTime: "09:00", endTime: "10:30" },
    ]);
  });

  it("parses several segments with their own times", () => {
    expect(parseWeeklySchedule("یکشنبه از 8:0 تا 9:30 سه شنبه از 13:30 تا 15:0")).toEqual([
      { dayOfWeek: 1, startTime: "08:00", endTime: "09:30" },
      { dayOfWeek: 3, startTime: "13:30", endTime: "15:00" },
    ]);
  });

  it("accepts a zero-width non-joiner inside a day name", () => {
    expect(parseWeeklySchedule("سه‌شنبه از 10:0 تا 12:0")).toEqual([
      { dayOfWeek: 3, startTime: "10:00", endTime: "12:00" },
    ]);
  });

  it("drops unknown day names without losing the rest of the segment", () => {
    expect(parseWeeklySchedule("فلان و جمعه از 7:0 تا 8:0")).toEqual([
      { dayOfWeek: 6, startTime: "07:00", endTime: "08:00" },
    ]);
  });

  it("keeps parsing after a segment with no known day", () => {
    expect(parseWeeklySchedule("فلان از 7:0 تا 8:0 چهارشنبه از 9:0 تا 10:0")).toEqual([
      { dayOfWeek: 4, startTime: "09:00", endTime: "10:00" },
    ]);
  });

  it("returns an empty list for empty text", () => {
    expect(parseWeeklySchedule("")).toEqual([]);
  });
});

// ── formatSessions ────────────────────────────────────────────────────────────

describe("formatSessions", () => {
  it("joins the days when every session shares its times", () => {
    expect(
      formatSessions([
        { dayOfWeek: 0, startTime: "09:00", endTime: "10:30" },
        { dayOfWeek: 2, startTime: "09:00", endTime: "10:30" },
      ]),
    ).toBe("شنبه و دوشنبه از 09:00 تا 10:30");
  });

  it("joins three uniform sessions into one line", () => {
    expect(
      formatSessions([
        { dayOfWeek: 1, startTime: "08:00", endTime: "10:00" },
        { dayOfWeek: 3, startTime: "08:00", endTime: "10:00" },
        { dayOfWeek: 5, startTime: "08:00", endTime: "10:00" },
      ]),
    ).toBe("یکشنبه و سه‌شنبه و پنجشنبه از 08:00 تا 10:00");
  });

  it("lists each session separately when times differ", () => {
    expect(
      formatSessions([
        { dayOfWeek: 0, startTime: "09:00", endTime: "10:30" },
        { dayOfWeek: 2, startTime: "13:00", endTime: "14:30" },
      ]),
    ).toBe("شنبه از 09:00 تا 10:30، دوشنبه از 13:00 تا 14:30");
  });

  it("lists all three sessions when only one differs", () => {
    expect(
      formatSessions([
        { dayOfWeek: 0, startTime: "09:00", endTime: "10:30" },
        { dayOfWeek: 1, startTime: "09:00", endTime: "10:30" },
        { dayOfWeek: 4, startTime: "09:00", endTime: "11:00" },
      ]),
    ).toBe("شنبه از 09:00 تا 10:30، یکشنبه از 09:00 تا 10:30، چهارشنبه از 09:00 تا 11:00");
  });

  it("uses the undefined placeholder for no sessions", () => {
    expect(formatSessions([])).toBe("تعریف نشده");
  });

  it("round-trips parsed text", () => {
    expect(formatSessions(parseWeeklySchedule("شنبه و دوشنبه از 9:0 تا 10:30"))).toBe(
      "شنبه و دوشنبه از 09:00 تا 10:30",
    );
  });
});

// ── integers ──────────────────────────────────────────────────────────────────

describe("parseInteger / isDigits", () => {
  it("parses plain and signed integers", () => {
    expect(parseInteger("40")).toBe(40);
    expect(parseInteger(" -3 ")).toBe(-3);
  });

  it("parses Persian digits", () => {
    expect(parseInteger("۳")).toBe(3);
    expect(isDigits("۱۲")).toBe(true);
  });

  it("falls back to the default instead of throwing", () => {
    expect(parseInteger("12a")).toBe(0);
    expect(parseInteger("")).toBe(0);
    expect(parseInteger("n/a", 7)).toBe(7);
  });

  it("accepts only non-negative integer literals as row markers", () => {
    expect(isDigits("12345")).toBe(true);
    expect(isDigits("-1")).toBe(false);
    expect(isDigits("کد درس")).toBe(false);
    expect(isDigits("")).toBe(false);
  });
});
