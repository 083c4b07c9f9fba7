import type { RuleRegistry } from "../types/index.js";

/** Common abbreviations and trading names, consulted after exact names. */
export const BUILT_IN_ALIASES: Readonly<Record<string, readonly string[]>> = {
  "Standard Chartered": ["stanchart", "scb"],
  UOB: ["united overseas bank", "united overseas"],
  Citibank: ["citigroup", "citi"],
  HSBC: ["hongkong and shanghai banking corporation"],
};

export function aliasesFor(institution: string, registry: RuleRegistry): string[] {
  const own = registry.get(institution)?.aliases ?? [];
  const builtIn = BUILT_IN_ALIASES[institution] ?? [];
  return [...new Set([...own, ...builtIn].map((alias) => alias.toLowerCase()))];
}

function containsWord(haystack: string, phrase: string): boolean {
  const escaped = phrase.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`(?<![a-z0-9])${escaped}(?![a-z0-9])`).test(haystack);
}

function detectIn(haystack: string, registry: RuleRegistry): string | null {
  const lower = haystack.toLowerCase();

  for (const institution of registry.keys()) {
    if (lower.includes(institution.toLowerCase())) return institution;
  }

  for (const institution of registry.keys()) {
    if (aliasesFor(institution, registry).some((alias) => containsWord(lower, alias))) {
      return institution;
    }
  }

  return null;
}

/** First registered institution (by name, then alias) mentioned in the text. */
export function detectInstitution(text: string, registry: RuleRegistry): string | null {
  return detectIn(text, registry);
}

export function detectInstitutionFromFilename(fileName: string, registry: RuleRegistry): string | null {
  return detectIn(fileName.replace(/[_\-.]+/g, " "), registry);
}
