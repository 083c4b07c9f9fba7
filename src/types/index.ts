export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

export interface Transaction {
  readonly institution: string;
  readonly date: string; // YYYY-MM-DD
  readonly amount: number;
  readonly description: string;
  readonly category: string;
}

export interface SignPolicy {
  invertOnCreditFlag: boolean;
  plusMeansNegative: boolean;
}

/**
 * Role indices are 0-based over the pattern's capture groups,
 * so `date: 0` reads capture group 1.
 */
export interface CaptureRoles {
  date: number;
  description: number;
  amount: number;
  creditFlag?: number;
}

export interface ExtractionRule {
  institution: string;
  /** Both null for an inert rule, which matches nothing. */
  pattern: RegExp | null;
  roles: CaptureRoles | null;
  signPolicy: SignPolicy;
  dateFormat: string;
  aliases: readonly string[];
  anchorPattern?: RegExp;
  anchorFormat?: string;
}

export type RuleRegistry = ReadonlyMap<string, ExtractionRule>;

export type CategoryMap = ReadonlyMap<string, readonly string[]>;

export interface EngineConfig {
  rules: RuleRegistry;
  categories: CategoryMap;
  blacklist: readonly string[];
}

export interface StatementContext {
  anchor: CalendarDate | null;
}

export type DateFallbackStrategy = "current-year" | "rollback-if-future";

export type SkipReason = "blacklisted" | "date" | "amount" | "validation";

export interface SkippedMatch {
  reason: SkipReason;
  detail: string;
}

export interface ExtractionResult {
  transactions: Transaction[];
  anchor: CalendarDate | null;
  matchCount: number;
  skipped: SkippedMatch[];
}

export type DocumentStatus = "ok" | "unrecognized" | "no-matches" | "failed";

export interface DocumentResult {
  fileName: string;
  status: DocumentStatus;
  institution: string | null;
  transactions: Transaction[];
  anchor: CalendarDate | null;
  skipped: SkippedMatch[];
  error?: string;
  /** Set once the text source has read the document. */
  pageCount?: number;
  likelyScanned?: boolean;
}

export type BatchDiagnostic = "ok" | "no-documents" | "all-failed" | "none-recognized" | "no-matches";

export interface BatchSummary {
  diagnostic: BatchDiagnostic;
  documents: DocumentResult[];
  transactions: Transaction[];
}

export type ExportFormat = "csv" | "xlsx" | "json";
