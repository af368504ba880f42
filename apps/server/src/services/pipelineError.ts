export type PipelineErrorCode =
  | "service_call_failed"
  | "image_unresolved"
  | "cache_io_failed"
  | "invalid_rule_set"
  | "missing_config"
  | "model_not_running";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Anything thrown by a remote call that is not already classified counts as a
 * service failure for the image being processed.
 */
export function normalizeStageError(error: unknown): PipelineError {
  if (isPipelineError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new PipelineError("service_call_failed", message, { cause: error });
}
