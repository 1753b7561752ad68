import type { ExtractionField } from "./schemas.js";

export type LedgerErrorCode = "validation_failed" | "incomplete_extraction" | "operation_failed";

export type ValidationIssue = {
  path: string;
  message: string;
};

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LedgerError";
    this.code = code;
  }
}

export class ValidationError extends LedgerError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super("validation_failed", message);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class IncompleteExtractionError extends LedgerError {
  readonly missing: ExtractionField[];

  constructor(missing: ExtractionField[]) {
    super("incomplete_extraction", `incomplete extraction: missing ${missing.join(", ")}`);
    this.name = "IncompleteExtractionError";
    this.missing = missing;
  }
}

export class OperationFailedError extends LedgerError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super("operation_failed", `${operation} failed: ${describeError(cause)}`, { cause });
    this.name = "OperationFailedError";
    this.operation = operation;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
