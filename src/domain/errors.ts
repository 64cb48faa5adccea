export type PipelineErrorKind =
  | "UpstreamUnavailable"
  | "IndexUnavailable"
  | "EmbeddingUnavailable"
  | "SummarizerUnavailable";

export type PipelineWarning = "PartialCrawlFailure" | "EmptyContext";

/** Fatal failure of one pipeline stage, surfaced to the caller with a stable kind. */
export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "PipelineError";
    this.kind = kind;
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
