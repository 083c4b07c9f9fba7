import { stringify } from "csv-stringify/sync";
import type { Transaction } from "../types/index.js";
import { validateTransaction } from "../models/transaction.js";

export const EXPORT_COLUMNS = ["Institution", "Date", "Amount", "Description", "Category"] as const;

export type ExportRow = [string, string, string, string, string];

/** Validated row in export column order; amount always carries two fraction digits. */
export function toExportRow(transaction: Transaction): ExportRow {
  const valid = validateTransaction(transaction);
  return [valid.institution, valid.date, valid.amount.toFixed(2), valid.description, valid.category];
}

export class CSVGenerator {
  generateCSV(transactions: readonly Transaction[]): string {
    if (transactions.length === 0) {
      throw new Error("No transactions to convert");
    }

    const rows = transactions.map(toExportRow);

    return stringify(rows, {
      header: true,
      columns: [...EXPORT_COLUMNS],
    });
  }
}
