// Centralized error taxonomy shared by the catalog services

export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public status: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * A client-side constraint was violated before any request was sent
 * (empty id, batch ceiling exceeded, out-of-range limit).
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

/**
 * The credentials exchange with the token endpoint failed.
 * `status` is the token endpoint's HTTP status.
 */
export class AuthenticationError extends AppError {
  constructor(service: string, status: number, body?: string) {
    super(
      `${service} authentication failed: ${status}`,
      'AUTHENTICATION_ERROR',
      status,
      body ? { body } : undefined
    );
    this.name = 'AuthenticationError';
  }
}

/**
 * A resource request returned a non-2xx response.
 */
export class HttpError extends AppError {
  constructor(
    service: string,
    public endpoint: string,
    status: number,
    public statusText: string = '',
    body?: string
  ) {
    super(
      `${service} API error: ${status}${statusText ? ` ${statusText}` : ''} (${endpoint})`,
      'HTTP_ERROR',
      status,
      body ? { endpoint, body } : { endpoint }
    );
    this.name = 'HttpError';
  }
}

/**
 * Type guard to check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert unknown error to AppError
 */
export function toAppError(error: unknown): AppError {
  if (isAppError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new AppError(error.message, 'INTERNAL_ERROR', 500);
  }
  return new AppError('An unexpected error occurred', 'INTERNAL_ERROR', 500);
}
