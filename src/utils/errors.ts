/**
 * Application error hierarchy.
 *
 * Every error the repositories and the connection manager raise on purpose is an
 * AppError carrying a stable `code` and the HTTP status the error middleware
 * answers with.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      ...(this.details !== undefined && { details: this.details }),
    };
  }
}

/** Malformed input the caller can correct (400). */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, "VALIDATION_ERROR", 400, details);
  }
}

/** Referenced entity is absent or deleted (404). */
export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    const message = id
      ? `${resource} with id '${id}' not found`
      : `${resource} not found`;
    super(message, "NOT_FOUND", 404);
  }
}

/** Missing or invalid credentials (401). */
export class AuthenticationError extends AppError {
  constructor(message: string = "Authentication required") {
    super(message, "UNAUTHORIZED", 401);
  }
}

/** Actor lacks rights on the target (403). */
export class AuthorizationError extends AppError {
  constructor(
    message: string = "You do not have permission to perform this action"
  ) {
    super(message, "FORBIDDEN", 403);
  }
}

/** Lock conflict with a concurrent transaction (409). */
export class ConflictError extends AppError {
  constructor(message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, "CONFLICT", 409, details, options);
  }
}

export type ConnectionFailure =
  | "authentication"
  | "network"
  | "certificate"
  | "timeout"
  | "unavailable";

/** Database infrastructure failure, never the caller's fault (503). */
export class ConnectionError extends AppError {
  constructor(
    public readonly reason: ConnectionFailure,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, "DATABASE_UNAVAILABLE", 503, { reason }, options);
  }
}

/** Invalid process configuration. Fatal at startup. */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, "CONFIGURATION_ERROR", 500, details, options);
  }
}

/** Stored data violates an invariant (bad row shape, cyclic thread). */
export class DataIntegrityError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, "DATA_INTEGRITY_ERROR", 500, details);
  }
}

/** The caller went away before the operation finished. */
export class RequestAbortedError extends AppError {
  constructor(message: string = "Request was aborted by the client") {
    super(message, "REQUEST_ABORTED", 499);
  }
}

export const isAppError = (error: unknown): error is AppError =>
  error instanceof AppError;
