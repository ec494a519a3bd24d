export type AnalyzeErrorKind =
  | "unsupported_file_type"
  | "empty_file"
  | "parse_failure"
  | "missing_file";

/** Client-side fault in an analyze request; always answered with 400. */
export class AnalyzeError extends Error {
  readonly kind: AnalyzeErrorKind;
  readonly statusCode = 400;

  constructor(kind: AnalyzeErrorKind, message: string) {
    super(message);
    this.name = "AnalyzeError";
    this.kind = kind;
  }
}

export function isAnalyzeError(value: unknown): value is AnalyzeError {
  return value instanceof AnalyzeError;
}
