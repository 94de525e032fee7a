/**
 * Error taxonomy for the theme pipeline.
 *
 * Every error carries a stable `code` (sent to clients as-is) and the HTTP
 * status the API layer answers with.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'QUOTA_EXCEEDED'
  | 'RENDER_FAILED'
  | 'STORAGE_CONFLICT'
  | 'NOT_FOUND'
  | 'FORBIDDEN'
  | 'UNAUTHORIZED'
  | 'BANNED';

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or incomplete input. Always recoverable. */
export class ValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR';
  readonly status = 400;
}

export class QuotaExceededError extends AppError {
  readonly code = 'QUOTA_EXCEEDED';
  readonly status = 403;

  constructor(readonly used: number, readonly slots: number) {
    super(`No free theme slots (${used}/${slots})`);
  }
}

/** The preview could not be produced at all. Fatal to the submission. */
export class RenderError extends AppError {
  readonly code = 'RENDER_FAILED';
  readonly status = 500;
}

/** A uniqueness constraint rejected a write. */
export class ConflictError extends AppError {
  readonly code = 'STORAGE_CONFLICT';
  readonly status = 409;

  constructor(readonly constraint: string, options?: { cause?: unknown }) {
    super(`Unique constraint violated: ${constraint}`, options);
  }
}

export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND';
  readonly status = 404;

  constructor(readonly resource: string) {
    super(`${resource} not found`);
  }
}

export class ForbiddenError extends AppError {
  readonly code = 'FORBIDDEN';
  readonly status = 403;
}

/** No caller identity on a route that needs one. */
export class UnauthorizedError extends AppError {
  readonly code = 'UNAUTHORIZED';
  readonly status = 401;
}

export class BannedError extends AppError {
  readonly code = 'BANNED';
  readonly status = 403;

  constructor() {
    super('Account is banned');
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
