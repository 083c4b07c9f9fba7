import type { CalendarDate, ExtractionRule } from "../types/index.js";
import { parseFullDate, toISODate } from "./dateFormat.js";
import { logger } from "../utils/logger.js";

// Labelled dates only; a bare date may be a transaction line
export const ANCHOR_PATTERNS: readonly RegExp[] = [
  /Statement Date:\s*(\d{1,2}\s[A-Za-z]{3}\s\d{4})/i,
  /Statement Date:\s*([A-Za-z]{3,8}\s*\d{1,2},?\s*\d{4})/i,
  /Due Date:\s*(\d{1,2}\s[A-Za-z]{3}\s\d{4})/i,
  /Due Date:\s*([A-Za-z]{3,8}\s*\d{1,2},?\s*\d{4})/i,
  /Date:\s*(\d{1,2}\s[A-Za-z]{3}\s\d{4})/i,
  /Date:\s*([A-Za-z]{3,8}\s*\d{1,2},?\s*\d{4})/i,
  /(?:Statement|Due) Date:\s*(\d{1,2}\s[A-Za-z]{3}\s\d{2})\b/i,
];

export const ANCHOR_FORMATS: readonly string[] = [
  "%d %b %Y",
  "%B %d, %Y",
  "%B %d %Y",
  "%b %d, %Y",
  "%b %d %Y",
  "%d%b%Y",
  "%d %B %Y",
  "%B%d,%Y",
  "%B%d%Y",
  "%d %b %y",
  "%B %d, %y",
  "%B %d %y",
];

function parseWithFormats(value: string, formats: readonly string[]): CalendarDate | null {
  for (const format of formats) {
    const date = parseFullDate(value, format);
    if (date) {
      logger.debug(`Parsed statement date ${toISODate(date)} from '${value}' with ${format}`);
      return date;
    }
  }
  return null;
}

function firstCapture(pattern: RegExp, text: string): string | null {
  // rule patterns are compiled global; search from the start each time
  const probe = pattern.global ? new RegExp(pattern.source, pattern.flags.replace("g", "")) : pattern;
  const match = probe.exec(text);
  return match && match[1] !== undefined ? match[1].trim() : null;
}

/**
 * Locate the statement's cycle or due date. A rule-specific anchor pattern
 * is tried before the generic labelled patterns.
 */
export function findStatementAnchor(text: string, rule?: ExtractionRule): CalendarDate | null {
  if (rule?.anchorPattern) {
    const value = firstCapture(rule.anchorPattern, text);
    if (value) {
      const formats = rule.anchorFormat ? [rule.anchorFormat] : ANCHOR_FORMATS;
      const date = parseWithFormats(value, formats);
      if (date) return date;
      logger.warn(`⚠️  ${rule.institution} statement date '${value}' did not match ${formats.join(", ")}`);
    }
  }

  for (const pattern of ANCHOR_PATTERNS) {
    const value = firstCapture(pattern, text);
    if (!value) continue;

    const date = parseWithFormats(value, ANCHOR_FORMATS);
    if (date) return date;
    logger.warn(`⚠️  Failed to parse statement date with known formats: ${value}`);
  }

  logger.warn("⚠️  No statement date found in text");
  return null;
}
