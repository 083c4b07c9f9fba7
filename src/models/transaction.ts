import { TransactionSchema } from "../schemas/index.js";
import type { Transaction } from "../types/index.js";
import { ValidationError } from "../types/errors.js";

export function validateTransaction(candidate: Transaction): Transaction {
  const result = TransactionSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ValidationError(`Invalid transaction (${issues.join("; ")})`);
  }
  return candidate;
}

/** Build a validated, frozen transaction record. */
export function createTransaction(fields: Transaction): Transaction {
  const record: Transaction = {
    institution: fields.institution,
    date: fields.date,
    amount: fields.amount,
    description: fields.description.trim(),
    category: fields.category,
  };
  return Object.freeze(validateTransaction(record));
}
