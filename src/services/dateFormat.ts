import type { CalendarDate } from "../types/index.js";

const MONTHS_FULL = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];
const MONTHS_ABBR = MONTHS_FULL.map((m) => m.slice(0, 3));

/** Human-readable names accepted in rule files alongside strftime directives. */
export const DATE_FORMAT_ALIASES: Record<string, string> = {
  "day+abbreviated-month": "%d %b",
  "day+full-month": "%d %B",
  "abbreviated-month+day": "%b %d",
  "day/month": "%d/%m",
};

type Field = "day" | "month" | "monthAbbr" | "monthFull" | "year2" | "year4";

interface CompiledFormat {
  regex: RegExp;
  fields: Field[];
}

export interface DateParts {
  day: number;
  month: number;
  year?: number;
}

const DIRECTIVES: Record<string, { pattern: string; field: Field }> = {
  d: { pattern: "(3[01]|[12]\\d|0[1-9]|[1-9])", field: "day" },
  m: { pattern: "(1[0-2]|0[1-9]|[1-9])", field: "month" },
  b: { pattern: `(${MONTHS_ABBR.join("|")})`, field: "monthAbbr" },
  B: { pattern: `(${MONTHS_FULL.join("|")})`, field: "monthFull" },
  y: { pattern: "(\\d\\d)", field: "year2" },
  Y: { pattern: "(\\d{4})", field: "year4" },
};

const compiled = new Map<string, CompiledFormat>();

export class UnsupportedDateFormatError extends Error {
  constructor(format: string, directive: string) {
    super(`Unsupported directive %${directive} in date format '${format}'`);
    this.name = "UnsupportedDateFormatError";
  }
}

export function resolveFormatAlias(format: string): string {
  return DATE_FORMAT_ALIASES[format] ?? format;
}

export function compileDateFormat(format: string): CompiledFormat {
  const key = resolveFormatAlias(format);
  const cached = compiled.get(key);
  if (cached) return cached;

  let source = "";
  const fields: Field[] = [];

  for (let i = 0; i < key.length; i++) {
    const ch = key[i];
    if (ch === "%") {
      const directive = key[i + 1];
      i++;
      if (directive === "%") {
        source += "%";
        continue;
      }
      const definition = directive === undefined ? undefined : DIRECTIVES[directive];
      if (!definition) throw new UnsupportedDateFormatError(key, directive ?? "");
      source += definition.pattern;
      fields.push(definition.field);
    } else if (/\s/.test(ch)) {
      // a run of format whitespace matches one or more whitespace characters
      if (!source.endsWith("\\s+")) source += "\\s+";
    } else {
      source += ch.replace(/[.*+?^${}()|[\]\\\/-]/g, "\\$&");
    }
  }

  const result: CompiledFormat = { regex: new RegExp(`^${source}$`, "i"), fields };
  compiled.set(key, result);
  return result;
}

export function hasYearDirective(format: string): boolean {
  const key = resolveFormatAlias(format);
  return key.includes("%Y") || key.includes("%y");
}

/** Match `text` against a strftime-style format. Day/month ranges are not cross-checked here. */
export function parseDateParts(text: string, format: string): DateParts | null {
  const { regex, fields } = compileDateFormat(format);
  const match = regex.exec(text.trim());
  if (!match) return null;

  const parts: DateParts = { day: 1, month: 1 };
  fields.forEach((field, index) => {
    const value = match[index + 1].toLowerCase();
    switch (field) {
      case "day":
        parts.day = parseInt(value, 10);
        break;
      case "month":
        parts.month = parseInt(value, 10);
        break;
      case "monthAbbr":
        parts.month = MONTHS_ABBR.indexOf(value) + 1;
        break;
      case "monthFull":
        parts.month = MONTHS_FULL.indexOf(value) + 1;
        break;
      case "year2": {
        const short = parseInt(value, 10);
        parts.year = short < 69 ? 2000 + short : 1900 + short;
        break;
      }
      case "year4":
        parts.year = parseInt(value, 10);
        break;
    }
  });
  return parts;
}

/** Parse a date that carries its own year; null when the format or calendar rejects it. */
export function parseFullDate(text: string, format: string): CalendarDate | null {
  const parts = parseDateParts(text, format);
  if (!parts || parts.year === undefined) return null;
  if (!isValidDate(parts.year, parts.month, parts.day)) return null;
  return { year: parts.year, month: parts.month, day: parts.day };
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function isValidDate(year: number, month: number, day: number): boolean {
  return (
    Number.isInteger(year) &&
    Number.isInteger(month) &&
    Number.isInteger(day) &&
    year >= 1 &&
    year <= 9999 &&
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month)
  );
}

export function compareMonthDay(a: { month: number; day: number }, b: { month: number; day: number }): number {
  return a.month !== b.month ? a.month - b.month : a.day - b.day;
}

export function toISODate(date: CalendarDate): string {
  const pad = (n: number, width: number) => String(n).padStart(width, "0");
  return `${pad(date.year, 4)}-${pad(date.month, 2)}-${pad(date.day, 2)}`;
}

export function fromISODate(value: string): CalendarDate | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) return null;
  const [year, month, day] = [match[1], match[2], match[3]].map((v) => parseInt(v, 10));
  return isValidDate(year, month, day) ? { year, month, day } : null;
}
