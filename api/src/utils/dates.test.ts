import {
  addDays,
  formatDayLabel,
  isISODate,
  isWithin,
  mondayOf,
  normalizeDay,
  parseISODate,
  toISODate,
} from "./dates.js";

describe("calendar days", () => {
  it("formats a Date in local time", () => {
    expect(toISODate(new Date(2024, 0, 5, 23, 59))).toBe("2024-01-05");
  });

  it("rejects strings that are not real dates", () => {
    expect(isISODate("2024-02-29")).toBe(true);
    expect(isISODate("2023-02-29")).toBe(false);
    expect(isISODate("2024-13-01")).toBe(false);
    expect(isISODate("2024-6-1")).toBe(false);
    expect(parseISODate("nope")).toBeNull();
  });

  it("adds days across month and year boundaries", () => {
    expect(addDays("2024-02-28", 1)).toBe("2024-02-29");
    expect(addDays("2024-12-31", 1)).toBe("2025-01-01");
    expect(addDays("2024-03-01", -1)).toBe("2024-02-29");
  });

  test.each([
    ["2024-06-10", "2024-06-10"], // Monday
    ["2024-06-12", "2024-06-10"], // Wednesday
    ["2024-06-16", "2024-06-10"], // Sunday
    ["2024-01-03", "2024-01-01"],
    ["2025-01-01", "2024-12-30"],
  ])("monday of %s is %s", (day, monday) => {
    expect(mondayOf(day)).toBe(monday);
  });

  it("compares days inclusively", () => {
    expect(isWithin("2024-06-10", "2024-06-10", "2024-06-12")).toBe(true);
    expect(isWithin("2024-06-12", "2024-06-10", "2024-06-12")).toBe(true);
    expect(isWithin("2024-06-09", "2024-06-10", "2024-06-12")).toBe(false);
  });

  it("labels today and yesterday", () => {
    const now = new Date(2024, 5, 12, 8, 30);
    expect(formatDayLabel("2024-06-12", now)).toBe("Today");
    expect(formatDayLabel("2024-06-11", now)).toBe("Yesterday");
    expect(formatDayLabel("2024-06-10", now)).toBe("2024-06-10");
  });

  it("normalizes driver values to a day", () => {
    expect(normalizeDay("2024-06-12T00:00:00.000Z")).toBe("2024-06-12");
    expect(normalizeDay(new Date(2024, 5, 12))).toBe("2024-06-12");
  });
});
