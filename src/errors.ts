/** Structured context attached to every workgraph error. */
export type ErrorContext = Record<string, unknown>;

/** Base class for typed workgraph failures. */
export class WorkGraphError extends Error {
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.context = context;
  }
}

/**
 * Rejected input at the store or index boundary: dangling edge, unknown
 * enum value, malformed document, reused id, or a delete that would leave
 * edges dangling.
 */
export class ValidationError extends WorkGraphError {}

/**
 * An index mutation failed partway and was rolled back. Retry the write or
 * call `rebuild()`.
 */
export class IndexInconsistentError extends WorkGraphError {}

/** Lookup of an id that is not in the graph. */
export class NotFoundError extends WorkGraphError {
  readonly id: string;

  constructor(id: string, what = "Work item") {
    super(`${what} not found: ${id}`, { id });
    this.id = id;
  }
}

/** An analytics call was cancelled by its caller's AbortSignal. */
export class AnalyticsAbortedError extends WorkGraphError {}

/** Render any thrown value as a single-line message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
