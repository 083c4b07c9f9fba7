import type { SignPolicy } from "../types/index.js";
import { AmountParseError } from "../types/errors.js";

const DECIMAL = /^[+-]?\d+(?:\.\d{1,2})?$/;

/** Remove markers, currency and separators, keeping any leading sign. */
export function cleanAmountToken(raw: string): string {
  return raw
    .trim()
    .replace(/\s*(?:CR|DR)$/i, "")
    .replace(/\p{Sc}/gu, "")
    .replace(/^[A-Za-z]{1,3}\s*/, "")
    .replace(/\s*[A-Za-z]{1,3}$/, "")
    .replace(/[(),\s]/g, "");
}

/**
 * Parse a raw amount token and apply the institution's sign conventions.
 * Each trigger negates independently, so two triggers cancel out.
 */
export function normalizeAmount(raw: string, policy: SignPolicy, creditFlagPresent: boolean): number {
  const cleaned = cleanAmountToken(raw);
  if (!DECIMAL.test(cleaned)) {
    throw new AmountParseError(`Invalid amount '${raw.trim()}'`);
  }

  let amount = parseFloat(cleaned);

  if (policy.invertOnCreditFlag && creditFlagPresent) amount = -amount;
  if (raw.includes("(") && raw.includes(")")) amount = -amount;
  if (policy.plusMeansNegative && cleaned.startsWith("+")) amount = -amount;

  const rounded = Math.round(amount * 100) / 100;
  return rounded === 0 ? 0 : rounded;
}
