export type SearchErrorCode = "INVALID_SELECTION" | "INVALID_PROBLEM";

export class SearchError extends Error {
  readonly code: SearchErrorCode;
  readonly details: Record<string, unknown>;

  constructor(
    code: SearchErrorCode,
    message: string,
    details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "SearchError";
    this.code = code;
    this.details = details;
  }
}
