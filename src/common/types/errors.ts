/**
 * Base error types for the application
 * Module errors are plain data, discriminated by `type`
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Infrastructure errors (warehouse queries, snapshot files)
 */
export interface InfraError extends AppError {
  readonly type: 'DatabaseError' | 'SnapshotError' | 'TimeoutError';
  readonly retryable: boolean;
}

/**
 * Validation errors (input validation failures)
 */
export interface ValidationError extends AppError {
  readonly type: 'ValidationError';
  readonly field?: string | undefined;
  readonly value?: unknown;
}

/**
 * Not found errors
 */
export interface NotFoundError extends AppError {
  readonly type: 'NotFoundError';
  readonly resource: string;
  readonly id: string;
}

export const createNotFoundError = (resource: string, id: string): NotFoundError => ({
  type: 'NotFoundError',
  message: `${resource} with id '${id}' not found`,
  resource,
  id,
});

export const createValidationError = (
  message: string,
  field?: string,
  value?: unknown
): ValidationError => ({
  type: 'ValidationError',
  message,
  ...(field !== undefined && { field }),
  ...(value !== undefined && { value }),
});

export const createDatabaseError = (message: string, cause?: unknown): InfraError => ({
  type: 'DatabaseError',
  message,
  retryable: true,
  cause,
});

export const createSnapshotError = (message: string, cause?: unknown): InfraError => ({
  type: 'SnapshotError',
  message,
  retryable: false,
  cause,
});

/**
 * Errors any data-backed use case can return
 */
export type QueryError = InfraError | ValidationError | NotFoundError;

const HTTP_STATUS_BY_ERROR_TYPE: Record<QueryError['type'], 400 | 404 | 500 | 504> = {
  ValidationError: 400,
  NotFoundError: 404,
  DatabaseError: 500,
  SnapshotError: 500,
  TimeoutError: 504,
};

/**
 * Maps a use-case error to the HTTP status used by the REST layer.
 */
export const getHttpStatusForError = (error: QueryError): 400 | 404 | 500 | 504 => {
  return HTTP_STATUS_BY_ERROR_TYPE[error.type];
};
