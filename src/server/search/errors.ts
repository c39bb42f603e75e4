export type SearchServiceErrorCode =
  | "invalid_intent"
  | "missing_field"
  | "backend_unavailable"
  | "cache_unavailable"
  | "malformed_cache_entry"
  | "vectorization_failed"
  | "aborted";

export class SearchServiceError extends Error {
  readonly code: SearchServiceErrorCode;
  readonly data?: Record<string, unknown>;

  constructor(
    code: SearchServiceErrorCode,
    message: string,
    data?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SearchServiceError";
    this.code = code;
    if (data !== undefined) {
      this.data = data;
    }
  }
}

export function isSearchServiceError(
  error: unknown,
  code?: SearchServiceErrorCode,
): error is SearchServiceError {
  if (!(error instanceof SearchServiceError)) return false;
  return code ? error.code === code : true;
}

export function getErrorSummary(error: unknown): string {
  if (error instanceof Error && typeof error.message === "string") {
    return error.message;
  }
  if (error === null || error === undefined) {
    return "Unknown error";
  }
  return String(error);
}
