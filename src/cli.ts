#!/usr/bin/env node
import dotenv from "dotenv";
dotenv.config();

import { realpathSync } from "fs";
import path from "path";
import { pathToFileURL } from "url";
import { parseArgs } from "util";
import { getConfig, type AppConfig } from "./config/env.js";
import { listStatementFiles, processDocuments } from "./services/batchProcessor.js";
import { writeExports } from "./services/exportWriter.js";
import { loadEngineConfig } from "./services/ruleRegistry.js";
import { StatementTextSource } from "./services/textSource.js";
import type { BatchSummary, EngineConfig, ExportFormat } from "./types/index.js";
import { ConfigError, errorMessage } from "./types/errors.js";
import { logger } from "./utils/logger.js";

const USAGE = `Usage: statement-ledger [--input <dir>] [--output <dir>] [--formats csv,xlsx,json]`;

const ALL_FORMATS: readonly ExportFormat[] = ["csv", "xlsx", "json"];

export function parseFormats(value: string | undefined): ExportFormat[] {
  if (!value) return [...ALL_FORMATS];
  const requested = value
    .split(",")
    .map((format) => format.trim().toLowerCase())
    .filter(Boolean);
  const formats = ALL_FORMATS.filter((format) => requested.includes(format));
  const unknown = requested.filter((format) => !formats.some((known) => known === format));
  if (unknown.length > 0) {
    throw new Error(`Unknown export format(s): ${unknown.join(", ")}`);
  }
  return formats;
}

export interface CliResult {
  exitCode: number;
  summary?: BatchSummary;
  written: string[];
}

export async function runCli(argv: string[], config: AppConfig = getConfig()): Promise<CliResult> {
  const { values } = parseArgs({
    args: argv,
    options: {
      input: { type: "string", short: "i" },
      output: { type: "string", short: "o" },
      formats: { type: "string", short: "f" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) {
    logger.info(USAGE);
    return { exitCode: 0, written: [] };
  }

  const inputDir = values.input ? path.resolve(values.input) : config.statementsDir;
  const outputDir = values.output ? path.resolve(values.output) : config.outputDir;
  const formats = parseFormats(values.formats);

  logger.info("Starting bank statement processing");

  let engine: EngineConfig;
  try {
    engine = await loadEngineConfig(config);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(`❌ ${error.message}`);
      return { exitCode: 1, written: [] };
    }
    throw error;
  }

  if (engine.rules.size === 0) {
    logger.error("❌ No bank configuration available");
    return { exitCode: 0, written: [] };
  }

  const files = await listStatementFiles(inputDir);
  if (files.length === 0) {
    logger.warn(`⚠️  No statement files found in ${inputDir}`);
  }

  const summary = await processDocuments(files, engine, new StatementTextSource(), {
    maxWorkers: config.maxWorkers,
    fallback: config.dateFallback,
  });

  for (const doc of summary.documents) {
    const detail = doc.error ? ` (${doc.error})` : doc.likelyScanned ? " (likely scanned, text may be incomplete)" : "";
    logger.info(`  ${doc.fileName}: ${doc.status}, ${doc.institution ?? "unknown bank"}, ${doc.transactions.length} transactions${detail}`);
  }

  const written = await writeExports(summary.transactions, outputDir, formats);
  logger.info(`Successfully processed ${summary.transactions.length} transactions`);
  return { exitCode: 0, summary, written };
}

// Only run when executed directly, not when imported by tests
const invokedPath = process.argv[1] ? realpathSync(path.resolve(process.argv[1])) : "";
if (invokedPath && import.meta.url === pathToFileURL(invokedPath).href) {
  runCli(process.argv.slice(2))
    .then((result) => {
      process.exitCode = result.exitCode;
    })
    .catch((error: unknown) => {
      logger.error(`❌ Application failed: ${errorMessage(error)}`);
      logger.error(USAGE);
      process.exitCode = 1;
    });
}
