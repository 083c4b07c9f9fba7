import * as XLSX from "xlsx";
import type { Transaction } from "../types/index.js";
import { EXPORT_COLUMNS, toExportRow } from "./csvGenerator.js";

export class XLSXGenerator {
  generateXLSX(transactions: readonly Transaction[]): Buffer {
    if (transactions.length === 0) {
      throw new Error("No transactions to convert");
    }

    // Amounts go in as numbers so spreadsheets can sum them
    const worksheetData: Array<Array<string | number>> = [
      [...EXPORT_COLUMNS],
      ...transactions.map((transaction) => {
        const [institution, date, amount, description, category] = toExportRow(transaction);
        return [institution, date, Number(amount), description, category];
      }),
    ];

    const worksheet = XLSX.utils.aoa_to_sheet(worksheetData);

    worksheet["!cols"] = [
      { wch: 20 }, // Institution
      { wch: 12 }, // Date
      { wch: 12 }, // Amount
      { wch: 50 }, // Description
      { wch: 16 }, // Category
    ];

    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, worksheet, "Transactions");

    const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
    return buffer;
  }
}
