import type { CategoryMap } from "../types/index.js";

export const DEFAULT_CATEGORY = "Other";

export function categorize(description: string, categories: CategoryMap): string {
  const upper = description.toUpperCase();
  for (const [category, keywords] of categories) {
    for (const keyword of keywords) {
      if (keyword && upper.includes(keyword.toUpperCase())) return category;
    }
  }
  return DEFAULT_CATEGORY;
}

/**
 * Per-document categorizer. Results are memoized by description for the
 * lifetime of one instance only.
 */
export class Categorizer {
  private readonly cache = new Map<string, string>();

  constructor(private readonly categories: CategoryMap) {}

  categorize(description: string): string {
    const hit = this.cache.get(description);
    if (hit !== undefined) return hit;

    const category = categorize(description, this.categories);
    this.cache.set(description, category);
    return category;
  }
}
