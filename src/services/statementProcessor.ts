import type { DateFallbackStrategy, DocumentResult, EngineConfig } from "../types/index.js";
import { errorMessage } from "../types/errors.js";
import { detectInstitution, detectInstitutionFromFilename } from "./institutionDetector.js";
import type { TextSource } from "./textSource.js";
import { extractTransactions } from "./transactionExtractor.js";
import { logger } from "../utils/logger.js";

export interface ProcessOptions {
  /** Skip detection and use this institution's rule. */
  institution?: string;
  fallback?: DateFallbackStrategy;
  now?: Date;
}

function emptyResult(fileName: string, status: DocumentResult["status"], error?: string): DocumentResult {
  return { fileName, status, institution: null, transactions: [], anchor: null, skipped: [], error };
}

/** Detect the institution and extract its transactions from already-linearized text. */
export function processStatementText(
  fileName: string,
  text: string,
  config: EngineConfig,
  options: ProcessOptions = {}
): DocumentResult {
  let institution = options.institution ?? detectInstitution(text, config.rules);

  if (!institution) {
    institution = detectInstitutionFromFilename(fileName, config.rules);
    if (institution) logger.info(`Detected bank '${institution}' from filename ${fileName}`);
  }

  const rule = institution ? config.rules.get(institution) : undefined;
  if (!institution || !rule) {
    logger.warn(`⚠️  Could not detect bank for ${fileName}`);
    return emptyResult(fileName, "unrecognized", institution ? `No rule registered for ${institution}` : undefined);
  }

  const result = extractTransactions(text, rule, config.categories, {
    blacklist: config.blacklist,
    fallback: options.fallback,
    now: options.now,
  });

  logger.info(`✅ ${fileName}: ${institution}, ${result.transactions.length} of ${result.matchCount} matches kept`);

  return {
    fileName,
    status: result.transactions.length > 0 ? "ok" : "no-matches",
    institution,
    transactions: result.transactions,
    anchor: result.anchor,
    skipped: result.skipped,
  };
}

/**
 * Full per-document pipeline. Never rejects: a text-source or engine failure
 * becomes a `failed` result for this document only.
 */
export async function processStatementFile(
  fileName: string,
  buffer: Buffer,
  config: EngineConfig,
  textSource: TextSource,
  options: ProcessOptions = {}
): Promise<DocumentResult> {
  const startTime = Date.now();
  try {
    const { text, pageCount, likelyScanned } = await textSource.extractText(fileName, buffer);
    const result = processStatementText(fileName, text, config, options);
    logger.info(`Processed ${fileName} in ${((Date.now() - startTime) / 1000).toFixed(2)}s`);
    return { ...result, pageCount, likelyScanned };
  } catch (error) {
    logger.error(`❌ Failed to process ${fileName}: ${errorMessage(error)}`);
    return emptyResult(fileName, "failed", errorMessage(error));
  }
}
