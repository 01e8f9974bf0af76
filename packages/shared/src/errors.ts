/**
 * Pipeline Error Taxonomy
 *
 * Stage errors (backend, no text, unparseable response) are captured into
 * entity error fields by the pipeline. Request-path errors (not found,
 * storage, invalid input, conflict) propagate to the HTTP layer, which maps
 * `httpStatus` and `code` onto the error envelope.
 */

export type PipelineErrorCode =
  | 'backend_unavailable'
  | 'no_text_available'
  | 'model_response_unparseable'
  | 'storage_failure'
  | 'not_found'
  | 'invalid_request'
  | 'conflict';

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
  abstract readonly httpStatus: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** One extraction backend failed or timed out; the other still runs. */
export class BackendUnavailableError extends PipelineError {
  readonly code = 'backend_unavailable';
  readonly httpStatus = 502;
}

/** Neither backend produced usable text for a document. */
export class NoTextAvailableError extends PipelineError {
  readonly code = 'no_text_available';
  readonly httpStatus = 422;
}

export class ModelResponseUnparseableError extends PipelineError {
  readonly code = 'model_response_unparseable';
  readonly httpStatus = 502;
}

export class StorageFailureError extends PipelineError {
  readonly code = 'storage_failure';
  readonly httpStatus = 500;
}

export class NotFoundError extends PipelineError {
  readonly code = 'not_found';
  readonly httpStatus = 404;
}

export class InvalidRequestError extends PipelineError {
  readonly code = 'invalid_request';
  readonly httpStatus = 400;
}

export class ConflictError extends PipelineError {
  readonly code = 'conflict';
  readonly httpStatus = 409;
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/** Best-effort message for persisting into an error column. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
