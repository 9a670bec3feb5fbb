// shared/src/errors.ts
// Error taxonomy. Every error the services raise on purpose extends AppError,
// so the HTTP layer can map it to a status without string matching.

export type ErrorCode =
  | "validation_failed"
  | "not_found"
  | "forbidden"
  | "conflict"
  | "external_service_error"
  | "not_authenticated";

export interface ValidationIssue {
  path: string;
  message: string;
}

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  readonly code = "validation_failed" as const;
  readonly status = 400;

  constructor(message: string, readonly details: ValidationIssue[] = []) {
    super(message);
  }
}

export class NotFoundError extends AppError {
  readonly code = "not_found" as const;
  readonly status = 404;

  constructor(readonly entity: string, readonly id: string) {
    super(`${entity} ${id} not found`);
  }
}

export class PermissionError extends AppError {
  readonly code = "forbidden" as const;
  readonly status = 403;
}

export class ConflictError extends AppError {
  readonly code = "conflict" as const;
  readonly status = 409;

  constructor(message: string, readonly currentVersion?: number) {
    super(message);
  }
}

export class ExternalServiceError extends AppError {
  readonly code = "external_service_error" as const;
  readonly status = 502;

  constructor(readonly service: string, message: string, options?: { cause?: unknown }) {
    super(`${service}: ${message}`, options);
  }
}

export class AuthenticationError extends AppError {
  readonly code = "not_authenticated" as const;
  readonly status = 401;

  constructor(message = "Authentication required") {
    super(message);
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
