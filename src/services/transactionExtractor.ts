import type {
  CalendarDate,
  CategoryMap,
  DateFallbackStrategy,
  ExtractionResult,
  ExtractionRule,
  SkippedMatch,
  Transaction,
} from "../types/index.js";
import { AmountParseError, DateParseError, ValidationError } from "../types/errors.js";
import { createTransaction } from "../models/transaction.js";
import { normalizeAmount } from "./amountNormalizer.js";
import { Categorizer } from "./categorizer.js";
import { toISODate } from "./dateFormat.js";
import { resolveDate } from "./dateResolver.js";
import { DEFAULT_BLACKLIST } from "./ruleRegistry.js";
import { findStatementAnchor } from "./statementAnchor.js";
import { logger } from "../utils/logger.js";

export interface ExtractOptions {
  blacklist?: readonly string[];
  /** Overrides anchor detection; `null` forces the no-anchor fallback. */
  anchor?: CalendarDate | null;
  fallback?: DateFallbackStrategy;
  now?: Date;
}

function group(match: RegExpMatchArray, role: number): string {
  return (match[role + 1] ?? "").trim();
}

function isBlacklisted(description: string, blacklist: readonly string[]): string | undefined {
  const upper = description.toUpperCase();
  return blacklist.find((keyword) => upper.includes(keyword.toUpperCase()));
}

/**
 * Apply one institution's grammar to statement text.
 *
 * Matches come back in document order. A match that fails date, amount or
 * record validation is recorded in `skipped` and never stops the rest.
 */
export function extractTransactions(
  text: string,
  rule: ExtractionRule,
  categories: CategoryMap,
  options: ExtractOptions = {}
): ExtractionResult {
  const { roles } = rule;
  if (!rule.pattern || !roles) {
    logger.warn(`⚠️  No valid regex pattern configured for ${rule.institution}`);
    return { transactions: [], anchor: null, matchCount: 0, skipped: [] };
  }

  const anchor = options.anchor !== undefined ? options.anchor : findStatementAnchor(text, rule);
  if (!anchor) {
    logger.warn(
      `⚠️  No statement date for ${rule.institution}; using ${options.fallback ?? "current-year"} year fallback`
    );
  }

  const blacklist = options.blacklist ?? DEFAULT_BLACKLIST;
  const categorizer = new Categorizer(categories);
  const transactions: Transaction[] = [];
  const skipped: SkippedMatch[] = [];
  let matchCount = 0;

  const pattern = rule.pattern.global ? rule.pattern : new RegExp(rule.pattern.source, `${rule.pattern.flags}g`);

  for (const match of text.matchAll(pattern)) {
    matchCount++;
    const description = group(match, roles.description);

    const keyword = isBlacklisted(description, blacklist);
    if (keyword) {
      logger.debug(`Skipping transaction due to blacklisted keyword '${keyword}' in: ${description}`);
      skipped.push({ reason: "blacklisted", detail: description });
      continue;
    }

    try {
      const date = resolveDate(group(match, roles.date), rule.dateFormat, anchor, {
        fallback: options.fallback,
        now: options.now,
      });
      const creditFlag = roles.creditFlag !== undefined ? group(match, roles.creditFlag) : "";
      const amount = normalizeAmount(group(match, roles.amount), rule.signPolicy, creditFlag.length > 0);

      transactions.push(
        createTransaction({
          institution: rule.institution,
          date: toISODate(date),
          amount,
          description,
          category: categorizer.categorize(description),
        })
      );
    } catch (error) {
      if (error instanceof DateParseError) {
        skipped.push({ reason: "date", detail: error.message });
      } else if (error instanceof AmountParseError) {
        skipped.push({ reason: "amount", detail: error.message });
      } else if (error instanceof ValidationError) {
        skipped.push({ reason: "validation", detail: error.message });
      } else {
        throw error;
      }
      logger.warn(`⚠️  Failed to parse match '${match[0].trim()}': ${error.message}`);
    }
  }

  logger.debug(`Regex found ${matchCount} matches for ${rule.institution}, kept ${transactions.length}`);
  return { transactions, anchor, matchCount, skipped };
}
