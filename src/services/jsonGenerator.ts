import type { Transaction } from "../types/index.js";
import { toExportRow } from "./csvGenerator.js";

export interface TransactionRecord {
  institution: string;
  date: string;
  amount: string;
  description: string;
  category: string;
}

export class JSONGenerator {
  toRecords(transactions: readonly Transaction[]): TransactionRecord[] {
    return transactions.map((transaction) => {
      const [institution, date, amount, description, category] = toExportRow(transaction);
      return { institution, date, amount, description, category };
    });
  }

  generateJSON(transactions: readonly Transaction[]): string {
    if (transactions.length === 0) {
      throw new Error("No transactions to convert");
    }
    return JSON.stringify(this.toRecords(transactions), null, 2);
  }
}
