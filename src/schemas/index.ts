import { z } from "zod";
import { fromISODate } from "../services/dateFormat.js";

const GroupIndex = z.number().int().nonnegative();

/**
 * One institution's entry under `banks:` in the rules file.
 * Group indices are 0-based over the pattern's capture groups and may be
 * left out of an entry that has no pattern.
 */
export const BankRuleSchema = z.object({
  pattern: z.string().nullish(),
  transaction_date_group: GroupIndex.optional(),
  description_group: GroupIndex.optional(),
  amount_group: GroupIndex.optional(),
  cr_group: GroupIndex.nullish(),
  invert_amount_if_cr: z.boolean().default(false),
  plus_means_negative: z.boolean().default(false),
  parse_date_format: z.string().min(1).default("%d %b"),
  aliases: z.array(z.string().min(1)).default([]),
  statement_date_pattern: z.string().optional(),
  statement_date_format: z.string().optional(),
});

export type BankRuleDocument = z.infer<typeof BankRuleSchema>;

export const BankRulesFileSchema = z.object({
  banks: z.record(z.string().min(1), BankRuleSchema).nullish().transform((banks) => banks ?? {}),
  blacklist: z.array(z.string().min(1)).optional(),
});

export const CategoryFileSchema = z.object({
  categories: z.record(
    z.string().min(1),
    z
      .array(z.string())
      .nullish()
      .transform((keywords) => keywords ?? [])
  ),
});

const TWO_DECIMALS_EPSILON = 1e-6;

export const TransactionSchema = z.object({
  institution: z.string().trim().min(1, "institution is required"),
  date: z.string().refine((value) => fromISODate(value) !== null, "date must be a valid YYYY-MM-DD calendar date"),
  amount: z
    .number()
    .finite("amount must be finite")
    .refine(
      (value) => Math.abs(value * 100 - Math.round(value * 100)) < TWO_DECIMALS_EPSILON,
      "amount must have at most two fraction digits"
    ),
  description: z.string(),
  category: z.string().min(1, "category is required"),
});
