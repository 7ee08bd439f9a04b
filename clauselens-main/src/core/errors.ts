export type InputErrorCode = "EMPTY_QUESTION" | "INVALID_REQUEST" | "DOCUMENT_NOT_FOUND";

/** Caller mistakes. Surfaced immediately, never retried. */
export class InputError extends Error {
  constructor(
    message: string,
    public code: InputErrorCode,
  ) {
    super(message);
    this.name = "InputError";
  }
}

export class DocumentNotFoundError extends InputError {
  constructor(public documentId: string) {
    super(`Document not found: ${documentId}`, "DOCUMENT_NOT_FOUND");
    this.name = "DocumentNotFoundError";
  }
}

export type ProviderErrorCode = "UNAVAILABLE" | "TIMEOUT" | "MALFORMED_RESPONSE" | "ABORTED";

/**
 * Completion-provider failures. Synthesis recovers from every code by
 * switching to the extractive strategy for the request.
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public code: ProviderErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ProviderError";
  }
}

export type RuleLibraryErrorCode = "UNREADABLE" | "INVALID_SHAPE" | "INVALID_PATTERN" | "UNKNOWN_POLICY";

/** Fatal configuration error in the risk rule table. Raised at load time only. */
export class RuleLibraryError extends Error {
  constructor(
    message: string,
    public code: RuleLibraryErrorCode,
    public ruleId?: string,
  ) {
    super(ruleId ? `[${ruleId}] ${message}` : message);
    this.name = "RuleLibraryError";
  }
}

export class CitationRangeError extends Error {
  public readonly code = "OUT_OF_BOUNDS";

  constructor(message: string) {
    super(message);
    this.name = "CitationRangeError";
  }
}

export type DataTruncationCode = "page_truncated" | "document_truncated" | "pages_dropped" | "no_text";

/** Attached to ingestion results when size caps cut text. Never thrown. */
export interface DataTruncationWarning {
  code: DataTruncationCode;
  message: string;
  page?: number;
  originalLength: number;
  keptLength: number;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
