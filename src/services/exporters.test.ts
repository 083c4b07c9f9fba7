import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { existsSync } from "fs";
import { mkdtemp, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import * as XLSX from "xlsx";
import { CSVGenerator, toExportRow } from "./csvGenerator.js";
import { JSONGenerator } from "./jsonGenerator.js";
import { XLSXGenerator } from "./xlsxGenerator.js";
import { exportFileName, writeExports } from "./exportWriter.js";
import { createTransaction } from "../models/transaction.js";
import { ValidationError } from "../types/errors.js";
import type { Transaction } from "../types/index.js";

const transactions: Transaction[] = [
  createTransaction({ institution: "HSBC", date: "2024-01-01", amount: 50, description: "AMAZON.COM", category: "Shopping" }),
  createTransaction({ institution: "HSBC", date: "2024-01-02", amount: -3.5, description: "COFFEE, TEA", category: "Dining" }),
];

const EXPECTED_CSV = [
  "Institution,Date,Amount,Description,Category",
  "HSBC,2024-01-01,50.00,AMAZON.COM,Shopping",
  'HSBC,2024-01-02,-3.50,"COFFEE, TEA",Dining',
  "",
].join("\n");

describe("toExportRow", () => {
  it("formats amounts with two fraction digits", () => {
    expect(toExportRow(transactions[1])).toEqual(["HSBC", "2024-01-02", "-3.50", "COFFEE, TEA", "Dining"]);
  });

  it("rejects a record that fails validation", () => {
    const invalid: Transaction = { institution: "HSBC", date: "2024-02-30", amount: 1, description: "X", category: "Other" };

    expect(() => toExportRow(invalid)).toThrow(ValidationError);
  });
});

describe("CSVGenerator", () => {
  it("writes a header and quotes fields containing commas", () => {
    expect(new CSVGenerator().generateCSV(transactions)).toBe(EXPECTED_CSV);
  });

  it("refuses an empty list", () => {
    expect(() => new CSVGenerator().generateCSV([])).toThrow("No transactions to convert");
  });
});

describe("XLSXGenerator", () => {
  it("writes a Transactions sheet with numeric amounts", () => {
    const buffer = new XLSXGenerator().generateXLSX(transactions);
    const workbook = XLSX.read(buffer, { type: "buffer" });

    expect(workbook.SheetNames).toEqual(["Transactions"]);
    const rows = XLSX.utils.sheet_to_json(workbook.Sheets["Transactions"], { header: 1 });
    expect(rows).toEqual([
      ["Institution", "Date", "Amount", "Description", "Category"],
      ["HSBC", "2024-01-01", 50, "AMAZON.COM", "Shopping"],
      ["HSBC", "2024-01-02", -3.5, "COFFEE, TEA", "Dining"],
    ]);
  });
});

describe("JSONGenerator", () => {
  it("emits records with string amounts", () => {
    const json = new JSONGenerator().generateJSON(transactions);

    expect(JSON.parse(json)).toEqual([
      { institution: "HSBC", date: "2024-01-01", amount: "50.00", description: "AMAZON.COM", category: "Shopping" },
      { institution: "HSBC", date: "2024-01-02", amount: "-3.50", description: "COFFEE, TEA", category: "Dining" },
    ]);
  });
});

describe("exportFileName", () => {
  it("stamps the file with the local run date", () => {
    expect(exportFileName("csv", new Date(2026, 9, 19))).toBe("transactions_20261019.csv");
    expect(exportFileName("xlsx", new Date(2025, 0, 5))).toBe("transactions_20250105.xlsx");
  });
});

describe("writeExports", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "ledger-export-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("creates the output directory and writes one file per format", async () => {
    const outputDir = path.join(tempDir, "out");

    const written = await writeExports(transactions, outputDir, ["csv", "json"], new Date(2026, 9, 19));

    expect(written).toEqual([
      path.join(outputDir, "transactions_20261019.csv"),
      path.join(outputDir, "transactions_20261019.json"),
    ]);
    expect(await readFile(written[0], "utf-8")).toBe(EXPECTED_CSV);
  });

  it("writes nothing when there are no transactions", async () => {
    const outputDir = path.join(tempDir, "empty");

    expect(await writeExports([], outputDir, ["csv"])).toEqual([]);
    expect(existsSync(outputDir)).toBe(false);
  });
});
