import { mkdir, writeFile } from "fs/promises";
import path from "path";
import type { ExportFormat, Transaction } from "../types/index.js";
import { CSVGenerator } from "./csvGenerator.js";
import { JSONGenerator } from "./jsonGenerator.js";
import { XLSXGenerator } from "./xlsxGenerator.js";
import { logger } from "../utils/logger.js";

export function exportFileName(format: ExportFormat, date: Date): string {
  const stamp = [
    date.getFullYear(),
    String(date.getMonth() + 1).padStart(2, "0"),
    String(date.getDate()).padStart(2, "0"),
  ].join("");
  return `transactions_${stamp}.${format}`;
}

export function renderExport(format: ExportFormat, transactions: readonly Transaction[]): string | Buffer {
  switch (format) {
    case "csv":
      return new CSVGenerator().generateCSV(transactions);
    case "xlsx":
      return new XLSXGenerator().generateXLSX(transactions);
    case "json":
      return new JSONGenerator().generateJSON(transactions);
  }
}

/** Write one file per format into `outputDir`; returns the written paths. */
export async function writeExports(
  transactions: readonly Transaction[],
  outputDir: string,
  formats: readonly ExportFormat[],
  date: Date = new Date()
): Promise<string[]> {
  if (transactions.length === 0) {
    logger.warn("⚠️  No transactions to export");
    return [];
  }

  await mkdir(outputDir, { recursive: true });

  const written: string[] = [];
  for (const format of formats) {
    const filePath = path.join(outputDir, exportFileName(format, date));
    await writeFile(filePath, renderExport(format, transactions));
    logger.info(`💾 Exported ${transactions.length} transactions to ${format.toUpperCase()}: ${filePath}`);
    written.push(filePath);
  }
  return written;
}
