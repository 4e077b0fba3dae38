/**
 * Error kinds surfaced by the extraction pipeline.
 *
 * Only `EmptyDocumentError` ever escapes a run; the schema and configuration
 * errors are raised at startup. Timeouts are absorbed by the component that
 * issued the external call.
 */

export type PipelineErrorCode =
  | "EMPTY_DOCUMENT"
  | "SCHEMA_DEFINITION"
  | "CONFIGURATION"
  | "TIMEOUT"
  | "RUN_ABORTED";

export class PipelineError extends Error {
  constructor(
    readonly code: PipelineErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Every page yielded no usable text, or the PDF had no pages at all. */
export class EmptyDocumentError extends PipelineError {
  constructor(message = "Unable to extract text from document", cause?: unknown) {
    super("EMPTY_DOCUMENT", message, { cause });
  }
}

export class SchemaDefinitionError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super("SCHEMA_DEFINITION", message, { cause });
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super("CONFIGURATION", message, { cause });
  }
}

export class TimeoutError extends PipelineError {
  constructor(
    readonly label: string,
    readonly timeoutMs: number,
  ) {
    super("TIMEOUT", `${label} timed out after ${timeoutMs}ms`);
  }
}

export class RunAbortedError extends PipelineError {
  constructor(reason?: unknown) {
    super("RUN_ABORTED", "Extraction run was aborted", { cause: reason });
  }
}

/**
 * Short, log-safe description of an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
