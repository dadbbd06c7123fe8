import { describe, it, expect } from "vitest";
import { parseCalendarDate, toCalendarDate } from "./dates.js";

describe("toCalendarDate", () => {
  it("formats the local date with zero padding", () => {
    expect(toCalendarDate(new Date(2026, 0, 5, 23, 59))).toBe("2026-01-05");
  });
});

describe("parseCalendarDate", () => {
  it("accepts real dates", () => {
    expect(parseCalendarDate("2026-10-19")).toBe("2026-10-19");
    expect(parseCalendarDate("2024-02-29")).toBe("2024-02-29");
  });

  it("rejects impossible dates", () => {
    expect(parseCalendarDate("2026-02-30")).toBeNull();
    expect(parseCalendarDate("2026-13-01")).toBeNull();
  });

  it("rejects other formats and empty values", () => {
    expect(parseCalendarDate("19/10/2026")).toBeNull();
    expect(parseCalendarDate("2026-10-19T00:00:00Z")).toBeNull();
    expect(parseCalendarDate("")).toBeNull();
    expect(parseCalendarDate(undefined)).toBeNull();
    expect(parseCalendarDate(null)).toBeNull();
  });
});
