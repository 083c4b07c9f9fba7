export type StatementErrorCode =
  | "CONFIG_ERROR"
  | "PARSE_ERROR"
  | "DATE_PARSE_ERROR"
  | "AMOUNT_PARSE_ERROR"
  | "VALIDATION_ERROR";

export class StatementError extends Error {
  readonly code: StatementErrorCode;

  constructor(code: StatementErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StatementError";
    this.code = code;
  }
}

/** Missing or malformed rule/category source. Fatal to the whole run. */
export class ConfigError extends StatementError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_ERROR", message, options);
    this.name = "ConfigError";
  }
}

/** The text source failed on one document. */
export class ParseError extends StatementError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PARSE_ERROR", message, options);
    this.name = "ParseError";
  }
}

export class DateParseError extends StatementError {
  constructor(message: string) {
    super("DATE_PARSE_ERROR", message);
    this.name = "DateParseError";
  }
}

export class AmountParseError extends StatementError {
  constructor(message: string) {
    super("AMOUNT_PARSE_ERROR", message);
    this.name = "AmountParseError";
  }
}

export class ValidationError extends StatementError {
  constructor(message: string) {
    super("VALIDATION_ERROR", message);
    this.name = "ValidationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
