import { describe, it, expect } from "vitest";
import { resolveDate } from "./dateResolver.js";
import { DateParseError } from "../types/errors.js";

// Oct 19, 2026 in local time
const NOW = new Date(2026, 9, 19);

describe("resolveDate with an anchor", () => {
  const anchor = { year: 2025, month: 1, day: 15 };

  it("moves dates after the anchor's month/day into the previous year", () => {
    expect(resolveDate("20 Feb", "%d %b", anchor)).toEqual({ year: 2024, month: 2, day: 20 });
  });

  it("keeps the anchor's year for dates on or before it", () => {
    expect(resolveDate("15 Jan", "%d %b", anchor)).toEqual({ year: 2025, month: 1, day: 15 });
    expect(resolveDate("02 Jan", "%d %b", anchor)).toEqual({ year: 2025, month: 1, day: 2 });
  });

  it("searches backward for a leap year when Feb 29 lands in a common year", () => {
    expect(resolveDate("29 Feb", "%d %b", { year: 2025, month: 3, day: 1 })).toEqual({ year: 2024, month: 2, day: 29 });
    expect(resolveDate("29 Feb", "%d %b", { year: 2024, month: 1, day: 10 })).toEqual({ year: 2020, month: 2, day: 29 });
  });

  it("parses compact day-month tokens", () => {
    expect(resolveDate("14NOV", "%d%b", { year: 2024, month: 12, day: 5 })).toEqual({ year: 2024, month: 11, day: 14 });
  });

  it("accepts the friendly format names", () => {
    expect(resolveDate("01 Jan", "day+abbreviated-month", { year: 2024, month: 1, day: 31 })).toEqual({
      year: 2024,
      month: 1,
      day: 1,
    });
  });

  it("uses a year printed in the text over the anchor", () => {
    expect(resolveDate("12 Jan 2023", "%d %b", anchor)).toEqual({ year: 2023, month: 1, day: 12 });
  });
});

describe("resolveDate without an anchor", () => {
  it("uses the current year by default", () => {
    expect(resolveDate("05 Mar", "%d %b", null, { now: NOW })).toEqual({ year: 2026, month: 3, day: 5 });
    expect(resolveDate("25 Dec", "%d %b", null, { now: NOW })).toEqual({ year: 2026, month: 12, day: 25 });
  });

  it("moves Feb 29 forward to the next leap year", () => {
    expect(resolveDate("29 Feb", "%d %b", null, { now: NOW })).toEqual({ year: 2028, month: 2, day: 29 });
  });

  it("rolls future dates back a year with rollback-if-future", () => {
    const options = { now: NOW, fallback: "rollback-if-future" as const };
    expect(resolveDate("25 Dec", "%d %b", null, options)).toEqual({ year: 2025, month: 12, day: 25 });
    expect(resolveDate("01 Oct", "%d %b", null, options)).toEqual({ year: 2026, month: 10, day: 1 });
    expect(resolveDate("29 Feb", "%d %b", null, options)).toEqual({ year: 2024, month: 2, day: 29 });
  });
});

describe("resolveDate failures", () => {
  it.each(["30 Feb", "31 Apr", "00 Jan", "hello", ""])("rejects '%s'", (text) => {
    expect(() => resolveDate(text, "%d %b", null, { now: NOW })).toThrow(DateParseError);
  });

  it("rejects Feb 29 with an explicit common year", () => {
    expect(() => resolveDate("29 Feb 2023", "%d %b", null)).toThrow(DateParseError);
  });

  it("reports unsupported format directives as DateParseError", () => {
    expect(() => resolveDate("01 Jan", "%d %Q", null)).toThrow(DateParseError);
  });
});
