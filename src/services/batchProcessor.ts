import { readdir, readFile } from "fs/promises";
import path from "path";
import type { BatchDiagnostic, BatchSummary, DocumentResult, EngineConfig } from "../types/index.js";
import { errorMessage } from "../types/errors.js";
import { processStatementFile, type ProcessOptions } from "./statementProcessor.js";
import { isSupportedFile, type TextSource } from "./textSource.js";
import { logger } from "../utils/logger.js";

export interface StatementFile {
  fileName: string;
  read(): Promise<Buffer>;
}

export interface BatchOptions extends Omit<ProcessOptions, "institution"> {
  maxWorkers?: number;
}

export async function listStatementFiles(dir: string): Promise<StatementFile[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (error) {
    logger.warn(`⚠️  Cannot read statements directory ${dir}: ${errorMessage(error)}`);
    return [];
  }

  return entries
    .filter(isSupportedFile)
    .sort()
    .map((fileName) => ({
      fileName,
      read: () => readFile(path.join(dir, fileName)),
    }));
}

/** Run `task` over `items` with at most `limit` in flight; results keep input order. */
export async function runPool<T, R>(items: readonly T[], limit: number, task: (item: T) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await task(items[index]);
    }
  };

  const size = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: size }, () => worker()));
  return results;
}

export function diagnoseBatch(documents: readonly DocumentResult[]): BatchDiagnostic {
  if (documents.length === 0) return "no-documents";
  if (documents.some((doc) => doc.transactions.length > 0)) return "ok";
  const loaded = documents.filter((doc) => doc.status !== "failed");
  if (loaded.length === 0) return "all-failed";
  if (!loaded.some((doc) => doc.institution !== null)) return "none-recognized";
  return "no-matches";
}

export const DIAGNOSTIC_MESSAGES: Record<BatchDiagnostic, string> = {
  ok: "Transactions extracted",
  "no-documents": "No statement files found; check the input directory",
  "all-failed": "No statement could be read; check that the files are valid PDF or text documents",
  "none-recognized": "Statements found but no bank was recognized; add or fix a bank rule",
  "no-matches": "Banks recognized but no transactions matched; check the bank's pattern",
};

export async function processDocuments(
  files: readonly StatementFile[],
  config: EngineConfig,
  textSource: TextSource,
  options: BatchOptions = {}
): Promise<BatchSummary> {
  const { maxWorkers = 4, ...processOptions } = options;

  const documents = await runPool(files, maxWorkers, async (file): Promise<DocumentResult> => {
    let buffer: Buffer;
    try {
      buffer = await file.read();
    } catch (error) {
      logger.error(`❌ Failed to read ${file.fileName}: ${errorMessage(error)}`);
      return {
        fileName: file.fileName,
        status: "failed",
        institution: null,
        transactions: [],
        anchor: null,
        skipped: [],
        error: errorMessage(error),
      };
    }
    return processStatementFile(file.fileName, buffer, config, textSource, processOptions);
  });

  const diagnostic = diagnoseBatch(documents);
  const message = DIAGNOSTIC_MESSAGES[diagnostic];
  if (diagnostic === "ok") logger.info(`✅ ${message}`);
  else logger.warn(`⚠️  ${message}`);

  return {
    diagnostic,
    documents,
    transactions: documents.flatMap((doc) => doc.transactions),
  };
}
