import type { ValidationIssue } from "./search/types.js";

// ─── Error codes ────────────────────────────────────────────────────────────

export const SearchErrorCode = {
  VALIDATION_FAILED: "VALIDATION_FAILED",
  SCHEDULE_UNAVAILABLE: "SCHEDULE_UNAVAILABLE",
  SCHEDULE_TIMEOUT: "SCHEDULE_TIMEOUT",
  SCHEDULE_READ_TOO_LARGE: "SCHEDULE_READ_TOO_LARGE",
  SEARCH_ABORTED: "SEARCH_ABORTED",
} as const;

export type SearchErrorCode =
  (typeof SearchErrorCode)[keyof typeof SearchErrorCode];

// ─── Errors ─────────────────────────────────────────────────────────────────

/** Criteria rejected where the API has to throw instead of returning issues as data. */
export class SearchValidationError extends Error {
  readonly code = SearchErrorCode.VALIDATION_FAILED;
  readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[]) {
    super(issues.map((i) => `${i.field}: ${i.message}`).join("; "));
    this.name = "SearchValidationError";
    this.issues = issues;
    Object.setPrototypeOf(this, SearchValidationError.prototype);
  }
}

/**
 * The schedule store could not be read in full. Never cached and never turned
 * into an empty result. Retryable unless the read itself is too large to serve.
 */
export class InfrastructureError extends Error {
  readonly code: SearchErrorCode;
  readonly retryable: boolean;

  constructor(code: SearchErrorCode, message: string, options?: { cause?: unknown; retryable?: boolean }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "InfrastructureError";
    this.code = code;
    this.retryable = options?.retryable ?? true;
    Object.setPrototypeOf(this, InfrastructureError.prototype);
  }
}

/** The caller stopped waiting; any shared computation keeps running. */
export class SearchAbortedError extends Error {
  readonly code = SearchErrorCode.SEARCH_ABORTED;

  constructor(message = "Search was aborted by the caller") {
    super(message);
    this.name = "SearchAbortedError";
    Object.setPrototypeOf(this, SearchAbortedError.prototype);
  }
}
