import os from "os";
import path from "path";
import type { DateFallbackStrategy } from "../types/index.js";

export interface AppConfig {
  port: number;
  frontendUrl: string;
  bankRulesFile: string;
  categoryMappingFile: string;
  statementsDir: string;
  outputDir: string;
  maxWorkers: number;
  maxFileSizeMb: number;
  dateFallback: DateFallbackStrategy;
  debug: boolean;
}

function intFromEnv(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function fallbackFromEnv(value: string | undefined): DateFallbackStrategy {
  return value === "rollback-if-future" ? "rollback-if-future" : "current-year";
}

// Read at call time so values loaded by dotenv after import are picked up
export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cwd = process.cwd();
  return {
    port: intFromEnv(env.PORT, 3001),
    frontendUrl: env.FRONTEND_URL || "http://localhost:3000",
    bankRulesFile: path.resolve(cwd, env.BANK_RULES_FILE || "conf/bank_data_regex.yaml"),
    categoryMappingFile: path.resolve(cwd, env.CATEGORY_MAPPING_FILE || "conf/category_mapping.yaml"),
    statementsDir: path.resolve(cwd, env.STATEMENTS_DIR || "data/statements"),
    outputDir: path.resolve(cwd, env.OUTPUT_DIR || "data/csv"),
    maxWorkers: intFromEnv(env.MAX_WORKERS, os.cpus().length || 4),
    maxFileSizeMb: intFromEnv(env.MAX_FILE_SIZE_MB, 10),
    dateFallback: fallbackFromEnv(env.DATE_FALLBACK),
    debug: (env.LOG_LEVEL || "").toLowerCase() === "debug",
  };
}
