import { describe, it, expect } from "vitest";
import { extractTransactions } from "./transactionExtractor.js";
import { parseRules } from "./ruleRegistry.js";
import type { ExtractionRule } from "../types/index.js";
import { buildEngineConfig, STANDARD_CHARTERED_TEXT, TRUST_TEXT } from "../test-utils/fixtures.js";

function demoRule(amountPattern = "\\$?[\\d,]+\\.\\d{2}"): ExtractionRule {
  const { rules } = parseRules(`
banks:
  Demo Bank:
    pattern: '(?m)^(\\d{2} [A-Za-z]{3})\\s+(.+?)\\s+(${amountPattern})$'
    transaction_date_group: 0
    description_group: 1
    amount_group: 2
    parse_date_format: day+abbreviated-month
`);
  const rule = rules.get("Demo Bank");
  if (!rule) throw new Error("Demo Bank rule missing");
  return rule;
}

const shopping = new Map([["Shopping", ["AMAZON"]]]);

describe("extractTransactions", () => {
  it("extracts a single statement line end to end", () => {
    const text = "Demo Bank\nStatement Date: 31 Jan 2024\n01 Jan   AMAZON.COM   $50.00\n";

    const result = extractTransactions(text, demoRule(), shopping);

    expect(result.anchor).toEqual({ year: 2024, month: 1, day: 31 });
    expect(result.transactions).toEqual([
      { institution: "Demo Bank", date: "2024-01-01", amount: 50, description: "AMAZON.COM", category: "Shopping" },
    ]);
    expect(Object.isFrozen(result.transactions[0])).toBe(true);
  });

  it("returns an empty result when nothing matches", () => {
    const result = extractTransactions("Demo Bank\nNo activity this period", demoRule(), shopping);

    expect(result).toEqual({ transactions: [], anchor: null, matchCount: 0, skipped: [] });
  });

  it("extracts nothing from an inert rule", () => {
    const rule: ExtractionRule = { ...demoRule(), pattern: null };

    const result = extractTransactions("01 Jan   AMAZON.COM   $50.00", rule, shopping);

    expect(result.transactions).toEqual([]);
    expect(result.matchCount).toBe(0);
  });

  it("applies credit markers, the blacklist and the anchor year", () => {
    const { rules, categories, blacklist } = buildEngineConfig();
    const rule = rules.get("Standard Chartered");
    if (!rule) throw new Error("rule missing");

    const result = extractTransactions(STANDARD_CHARTERED_TEXT, rule, categories, { blacklist });

    expect(result.anchor).toEqual({ year: 2025, month: 1, day: 15 });
    expect(result.matchCount).toBe(4);
    expect(result.transactions.map((t) => [t.date, t.amount, t.description, t.category])).toEqual([
      ["2024-12-12", 23.4, "GRABFOOD SINGAPORE", "Dining"],
      ["2024-12-20", 1050, "AMAZON MARKETPLACE", "Shopping"],
      ["2025-01-02", -50, "REFUND AMAZON", "Shopping"],
    ]);
    expect(result.skipped).toEqual([{ reason: "blacklisted", detail: "PAYMENT VIA GIRO" }]);
  });

  it("uses the rule's anchor pattern and plus-means-negative policy", () => {
    const { rules, categories, blacklist } = buildEngineConfig();
    const rule = rules.get("Trust");
    if (!rule) throw new Error("rule missing");

    const result = extractTransactions(TRUST_TEXT, rule, categories, { blacklist });

    expect(result.anchor).toEqual({ year: 2025, month: 4, day: 5 });
    expect(result.transactions).toEqual([
      { institution: "Trust", date: "2025-03-28", amount: 45.1, description: "NTUC FAIRPRICE", category: "Groceries" },
      { institution: "Trust", date: "2025-04-01", amount: -200, description: "Card repayment", category: "Other" },
    ]);
  });

  it("skips blacklisted descriptions in any case", () => {
    const text = "Statement Date: 31 Jan 2024\n02 Jan   previous BALANCE   $10.00\n03 Jan   AMAZON   $5.00";

    const result = extractTransactions(text, demoRule(), shopping);

    expect(result.transactions.map((t) => t.description)).toEqual(["AMAZON"]);
    expect(result.skipped).toEqual([{ reason: "blacklisted", detail: "previous BALANCE" }]);
  });

  it("skips only the malformed match and keeps document order", () => {
    const text = [
      "Statement Date: 31 Jan 2024",
      "05 Jan   COFFEE   3.50",
      "31 Feb   BAD DATE   10.00",
      "03 Jan   WEIRD   12.345",
      "02 Jan   TEA   4.00",
    ].join("\n");

    const result = extractTransactions(text, demoRule("\\S+"), shopping);

    expect(result.transactions.map((t) => [t.date, t.description])).toEqual([
      ["2024-01-05", "COFFEE"],
      ["2024-01-02", "TEA"],
    ]);
    expect(result.skipped.map((s) => s.reason)).toEqual(["date", "amount"]);
  });

  it("falls back to the wall-clock year without an anchor", () => {
    const result = extractTransactions("01 Jan   AMAZON.COM   $50.00", demoRule(), shopping, {
      anchor: null,
      now: new Date(2026, 9, 19),
    });

    expect(result.anchor).toBeNull();
    expect(result.transactions[0]?.date).toBe("2026-01-01");
  });

  it("does not take a transaction line for the statement date", () => {
    const { rules, categories, blacklist } = buildEngineConfig();
    const rule = rules.get("Standard Chartered");
    if (!rule) throw new Error("rule missing");
    const unlabelled = STANDARD_CHARTERED_TEXT.replace("Statement Date: 15 Jan 2025\n", "");
    const now = new Date(2026, 9, 19);

    const current = extractTransactions(unlabelled, rule, categories, { blacklist, now });
    const rollback = extractTransactions(unlabelled, rule, categories, { blacklist, now, fallback: "rollback-if-future" });

    expect(current.anchor).toBeNull();
    expect(current.transactions.map((t) => t.date)).toEqual(["2026-12-12", "2026-12-20", "2026-01-02"]);
    expect(rollback.transactions.map((t) => t.date)).toEqual(["2025-12-12", "2025-12-20", "2026-01-02"]);
  });
});
