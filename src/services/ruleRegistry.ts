import { readFile } from "fs/promises";
import path from "path";
import { parse as parseYaml } from "yaml";
import type { ZodError } from "zod";
import { BankRulesFileSchema, CategoryFileSchema, type BankRuleDocument } from "../schemas/index.js";
import type { CaptureRoles, CategoryMap, EngineConfig, ExtractionRule, RuleRegistry } from "../types/index.js";
import { ConfigError, errorMessage } from "../types/errors.js";
import { compileDateFormat } from "./dateFormat.js";
import { compilePattern, countCaptureGroups } from "./patternCompiler.js";
import { logger } from "../utils/logger.js";

export const DEFAULT_BLACKLIST: readonly string[] = Object.freeze([
  "outstanding balance",
  "Previous balance",
  "Credit Payment",
  "PAYMENT VIA",
  "PREVIOUS STATEMENT",
  "LATECHARGEFEE",
  "POSTING AMOUNT",
  "CASHBACK",
  "CASH BACK",
  "CASH REBATE",
  "LATE CHARGE",
]);

export interface ParsedRules {
  rules: RuleRegistry;
  blacklist: readonly string[];
}

function formatZodError(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
}

function parseDocument(content: string, sourceName: string): unknown {
  try {
    return path.extname(sourceName).toLowerCase() === ".json" ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${sourceName}: ${errorMessage(error)}`, { cause: error });
  }
}

async function readSource(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to load ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
}

function buildRule(institution: string, doc: BankRuleDocument): ExtractionRule {
  const where = `bank '${institution}'`;

  try {
    compileDateFormat(doc.parse_date_format);
    if (doc.statement_date_format) compileDateFormat(doc.statement_date_format);
  } catch (error) {
    throw new ConfigError(`${where}: ${errorMessage(error)}`, { cause: error });
  }

  let pattern: RegExp | null = null;
  let roles: CaptureRoles | null = null;
  if (doc.pattern && doc.pattern.trim()) {
    const { transaction_date_group: date, description_group: description, amount_group: amount } = doc;
    if (date === undefined || description === undefined || amount === undefined) {
      throw new ConfigError(`${where}: a pattern needs transaction_date_group, description_group and amount_group`);
    }

    try {
      pattern = compilePattern(doc.pattern);
    } catch (error) {
      throw new ConfigError(`${where}: ${errorMessage(error)}`, { cause: error });
    }

    const groups = countCaptureGroups(pattern);
    const groupRoles: Array<[string, number | null | undefined]> = [
      ["transaction_date_group", doc.transaction_date_group],
      ["description_group", doc.description_group],
      ["amount_group", doc.amount_group],
      ["cr_group", doc.cr_group],
    ];
    for (const [name, index] of groupRoles) {
      if (index !== null && index !== undefined && index >= groups) {
        throw new ConfigError(`${where}: ${name} ${index} references a missing capture group (pattern has ${groups})`);
      }
    }
    roles = Object.freeze({ date, description, amount, creditFlag: doc.cr_group ?? undefined });
  } else {
    logger.warn(`⚠️  No pattern configured for ${institution}; rule is inert`);
  }

  let anchorPattern: RegExp | undefined;
  if (doc.statement_date_pattern) {
    try {
      anchorPattern = compilePattern(doc.statement_date_pattern);
    } catch (error) {
      throw new ConfigError(`${where}: statement_date_pattern: ${errorMessage(error)}`, { cause: error });
    }
    if (countCaptureGroups(anchorPattern) < 1) {
      throw new ConfigError(`${where}: statement_date_pattern needs a capture group`);
    }
  }

  return Object.freeze({
    institution,
    pattern,
    roles,
    signPolicy: Object.freeze({
      invertOnCreditFlag: doc.invert_amount_if_cr,
      plusMeansNegative: doc.plus_means_negative,
    }),
    dateFormat: doc.parse_date_format,
    aliases: Object.freeze([...doc.aliases]),
    anchorPattern,
    anchorFormat: doc.statement_date_format,
  });
}

/** Parse a rules document already in memory. JSON when `sourceName` ends in .json, YAML otherwise. */
export function parseRules(content: string, sourceName = "rules.yaml"): ParsedRules {
  const parsed = BankRulesFileSchema.safeParse(parseDocument(content, sourceName) ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid rules in ${sourceName}: ${formatZodError(parsed.error)}`);
  }

  const rules = new Map<string, ExtractionRule>();
  for (const [institution, doc] of Object.entries(parsed.data.banks)) {
    rules.set(institution, buildRule(institution, doc));
  }

  return {
    rules,
    blacklist: Object.freeze([...(parsed.data.blacklist ?? DEFAULT_BLACKLIST)]),
  };
}

export function parseCategories(content: string, sourceName = "categories.yaml"): CategoryMap {
  const parsed = CategoryFileSchema.safeParse(parseDocument(content, sourceName));
  if (!parsed.success) {
    throw new ConfigError(`Invalid categories in ${sourceName}: ${formatZodError(parsed.error)}`);
  }

  const categories = new Map<string, readonly string[]>();
  for (const [category, keywords] of Object.entries(parsed.data.categories)) {
    categories.set(category, Object.freeze(keywords.filter((keyword) => keyword.trim().length > 0)));
  }
  return categories;
}

export async function loadRules(filePath: string): Promise<ParsedRules> {
  return parseRules(await readSource(filePath), filePath);
}

export async function loadCategories(filePath: string): Promise<CategoryMap> {
  return parseCategories(await readSource(filePath), filePath);
}

export interface EngineConfigPaths {
  bankRulesFile: string;
  categoryMappingFile: string;
}

let engineConfig: Promise<EngineConfig> | null = null;

/**
 * Load rules and categories once per process. Later calls share the same
 * result, whatever paths they pass.
 */
export function loadEngineConfig(paths: EngineConfigPaths): Promise<EngineConfig> {
  if (!engineConfig) {
    engineConfig = (async () => {
      const [{ rules, blacklist }, categories] = await Promise.all([
        loadRules(paths.bankRulesFile),
        loadCategories(paths.categoryMappingFile),
      ]);
      logger.info(`📚 Loaded ${rules.size} bank rule(s) and ${categories.size} categories`);
      return Object.freeze({ rules, categories, blacklist });
    })();
    engineConfig.catch(() => {
      engineConfig = null;
    });
  }
  return engineConfig;
}

export function resetEngineConfig(): void {
  engineConfig = null;
}
