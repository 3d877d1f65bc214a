/**
 * Error taxonomy
 *
 * Every error a tool can surface carries a stable `code` that ends up as the
 * `errorType` of the error envelope.
 */

export type ServiceErrorKind = 'timeout' | 'unreachable' | 'rejected' | 'malformed_response';

export type ErrorCode =
  | 'validation'
  | `service_${ServiceErrorKind}`
  | 'missing_data'
  | 'not_found'
  | 'unknown';

/**
 * Bad tool input. Recoverable by calling again with corrected parameters.
 */
export class ValidationError extends Error {
  readonly code = 'validation' as const;

  constructor(readonly field: string, message: string) {
    super(`Invalid value for "${field}": ${message}`);
    this.name = 'ValidationError';
  }
}

/**
 * The TAP service could not answer the query. Never retried.
 */
export class ServiceError extends Error {
  readonly code: `service_${ServiceErrorKind}`;

  constructor(readonly kind: ServiceErrorKind, message: string, readonly status?: number) {
    super(message);
    this.name = 'ServiceError';
    this.code = `service_${kind}`;
  }
}

/**
 * A single record lacks the columns a calculation needs.
 * Fails that record only; siblings in the same batch still compute.
 */
export class MissingDataError extends Error {
  readonly code = 'missing_data' as const;

  constructor(readonly planet: string, readonly columns: string[]) {
    super(`Planet '${planet}' has no value for ${columns.join(', ')}`);
    this.name = 'MissingDataError';
  }
}

export type KnownError = ValidationError | ServiceError | MissingDataError;

export function isKnownError(error: unknown): error is KnownError {
  return error instanceof ValidationError
    || error instanceof ServiceError
    || error instanceof MissingDataError;
}

/**
 * Resolve the envelope code for any thrown value.
 */
export function errorCodeOf(error: unknown): ErrorCode {
  return isKnownError(error) ? error.code : 'unknown';
}

export function errorMessageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
