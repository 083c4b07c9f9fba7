import type { CalendarDate, DateFallbackStrategy } from "../types/index.js";
import { DateParseError, errorMessage } from "../types/errors.js";
import {
  compareMonthDay,
  hasYearDirective,
  isLeapYear,
  isValidDate,
  parseDateParts,
  type DateParts,
} from "./dateFormat.js";

// Year-less dates are first checked against a common year, then Feb 29 against a leap year
const NON_LEAP_REFERENCE_YEAR = 1900;
const LEAP_REFERENCE_YEAR = 2000;

export interface ResolveDateOptions {
  /** Year policy when the statement has no anchor date. */
  fallback?: DateFallbackStrategy;
  /** Wall clock used by the fallback policies. */
  now?: Date;
}

function isLeapDay(parts: { month: number; day: number }): boolean {
  return parts.month === 2 && parts.day === 29;
}

function nearestLeapYear(year: number, step: 1 | -1): number {
  let candidate = year;
  while (!isLeapYear(candidate)) candidate += step;
  return candidate;
}

function parsePartial(text: string, format: string): DateParts {
  let effectiveFormat = format;
  // A year printed in the text wins over the rule's year-less format
  if (!hasYearDirective(format) && /\b\d{4}\b/.test(text)) {
    effectiveFormat = `${format} %Y`;
  }

  let parts: DateParts | null;
  try {
    parts = parseDateParts(text, effectiveFormat);
  } catch (error) {
    throw new DateParseError(errorMessage(error));
  }
  if (!parts) {
    throw new DateParseError(`Cannot parse date '${text.trim()}' with format '${format}'`);
  }

  const validInCommonYear = isValidDate(NON_LEAP_REFERENCE_YEAR, parts.month, parts.day);
  const validAsLeapDay = isLeapDay(parts) && isValidDate(LEAP_REFERENCE_YEAR, parts.month, parts.day);
  if (!validInCommonYear && !validAsLeapDay) {
    throw new DateParseError(`Day ${parts.day} is out of range for month ${parts.month} in '${text.trim()}'`);
  }
  return parts;
}

function withYear(parts: DateParts, year: number, leapStep: 1 | -1): CalendarDate {
  const resolvedYear = isLeapDay(parts) && !isLeapYear(year) ? nearestLeapYear(year, leapStep) : year;
  return { year: resolvedYear, month: parts.month, day: parts.day };
}

function resolveWithoutAnchor(parts: DateParts, strategy: DateFallbackStrategy, now: Date): CalendarDate {
  const currentYear = now.getFullYear();

  if (strategy === "rollback-if-future") {
    const today = { month: now.getMonth() + 1, day: now.getDate() };
    const year = compareMonthDay(parts, today) > 0 ? currentYear - 1 : currentYear;
    return withYear(parts, year, -1);
  }

  return withYear(parts, currentYear, 1);
}

/**
 * Turn a year-less statement date into an absolute date.
 *
 * With an anchor (statement or due date), a month/day after the anchor's
 * belongs to the previous year. Without one, `options.fallback` decides.
 */
export function resolveDate(
  text: string,
  format: string,
  anchor: CalendarDate | null,
  options: ResolveDateOptions = {}
): CalendarDate {
  const parts = parsePartial(text, format);

  if (parts.year !== undefined) {
    if (!isValidDate(parts.year, parts.month, parts.day)) {
      throw new DateParseError(`'${text.trim()}' is not a valid calendar date`);
    }
    return { year: parts.year, month: parts.month, day: parts.day };
  }

  if (!anchor) {
    return resolveWithoutAnchor(parts, options.fallback ?? "current-year", options.now ?? new Date());
  }

  const year = compareMonthDay(parts, anchor) > 0 ? anchor.year - 1 : anchor.year;
  return withYear(parts, year, -1);
}
