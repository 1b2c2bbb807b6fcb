export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public code?: string
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, code?: string) {
    super(400, message, code);
    this.name = 'BadRequestError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized', code?: string) {
    super(401, message, code);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'Forbidden', code?: string) {
    super(403, message, code);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found', code?: string) {
    super(404, message, code);
    this.name = 'NotFoundError';
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message: string = 'Service unavailable', code?: string) {
    super(503, message, code);
    this.name = 'ServiceUnavailableError';
  }
}

/**
 * The query was empty or whitespace-only.
 */
export class InvalidQueryError extends BadRequestError {
  constructor(message: string = 'Query must not be empty') {
    super(message, 'INVALID_QUERY');
    this.name = 'InvalidQueryError';
  }
}

/**
 * A resolve option was out of range (result count, score floor, locale).
 */
export class InvalidArgumentError extends BadRequestError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

/**
 * The candidate store could not be reached. The driver error is kept as `cause`;
 * nothing retries on this error.
 */
export class StoreUnavailableError extends ServiceUnavailableError {
  constructor(message: string = 'Catalog store unavailable', cause?: unknown) {
    super(message, 'STORE_UNAVAILABLE');
    this.name = 'StoreUnavailableError';
    this.cause = cause;
  }
}
