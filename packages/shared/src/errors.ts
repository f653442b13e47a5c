// =============================================================================
// @feedsieve/shared: Pipeline error taxonomy
// =============================================================================
// Every failure the update pipeline reports is one of five kinds. Callers
// branch on `kind` (or instanceof) instead of matching message text.
// =============================================================================

export type PipelineErrorKind =
  | "validation"
  | "fetch"
  | "parse"
  | "filter"
  | "persistence";

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed URL, disallowed scheme, blocked destination, bad filter input. */
export class ValidationError extends PipelineError {
  readonly kind = "validation" as const;
}

/** Timeouts, connection failures, unexpected HTTP statuses, oversized bodies. */
export class FetchError extends PipelineError {
  readonly kind = "fetch" as const;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Response body is not a readable RSS/Atom document. */
export class ParseError extends PipelineError {
  readonly kind = "parse" as const;
}

/** Broken regex, unknown pattern/target type, filter config unavailable. */
export class FilterError extends PipelineError {
  readonly kind = "filter" as const;
}

/** A storage write or transaction failed. */
export class PersistenceError extends PipelineError {
  readonly kind = "persistence" as const;
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
