import { parseCategories, parseRules } from "../services/ruleRegistry.js";
import type { EngineConfig } from "../types/index.js";

export const RULES_YAML = `
banks:
  Standard Chartered:
    aliases: [stanchart]
    pattern: |
      (?mx)
      ^
      (\\d{2}\\s?[A-Za-z]{3})    # transaction date
      \\s+
      (\\d{2}\\s?[A-Za-z]{3})    # post date
      \\s+
      (.*?)                    # description
      \\s+
      (\\+?-?(?:\\d{1,3}(?:,\\d{3})*|\\d+)(?:\\.\\d{2}))
      (CR)?
      $
    parse_date_format: "%d %b"
    transaction_date_group: 0
    description_group: 2
    amount_group: 3
    cr_group: 4
    invert_amount_if_cr: true
  Trust:
    pattern: '(?m)^([0-3][0-9]\\s[A-Za-z]{3})\\s+(.*?)\\s+(\\+?-?(?:\\d{1,3}(?:,\\d{3})*|\\d+)(?:\\.\\d{2}))$'
    parse_date_format: "%d %b"
    transaction_date_group: 0
    description_group: 1
    amount_group: 2
    plus_means_negative: true
    statement_date_pattern: '(?i)Statement\\s+Date:\\s*(\\d{2}\\s[A-Za-z]{3}\\s\\d{4})'
    statement_date_format: "%d %b %Y"
`;

export const CATEGORIES_YAML = `
categories:
  Groceries: [FAIRPRICE]
  Dining: [FOOD, COFFEE]
  Shopping: [AMAZON]
`;

export const STANDARD_CHARTERED_TEXT = [
  "Standard Chartered Bank",
  "Statement Date: 15 Jan 2025",
  "12 Dec 13 Dec GRABFOOD SINGAPORE 23.40",
  "20 Dec 21 Dec AMAZON MARKETPLACE 1,050.00",
  "02 Jan 03 Jan REFUND AMAZON 50.00CR",
  "05 Jan 05 Jan PAYMENT VIA GIRO 500.00CR",
].join("\n");

export const TRUST_TEXT = [
  "Trust Bank",
  "Statement Date: 05 Apr 2025",
  "30 Mar Previous balance 120.00",
  "28 Mar NTUC FAIRPRICE 45.10",
  "01 Apr Card repayment +200.00",
].join("\n");

export function buildEngineConfig(): EngineConfig {
  const { rules, blacklist } = parseRules(RULES_YAML);
  return { rules, categories: parseCategories(CATEGORIES_YAML), blacklist };
}
