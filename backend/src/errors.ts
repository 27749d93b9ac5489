/**
 * Errors that cross the HTTP boundary carry their status code. Anything that is
 * not an AppError is reported as a 500.
 */
export class AppError extends Error {
  readonly status: number;
  readonly detail?: string;

  constructor(message: string, status: number, detail?: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.detail = detail;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, detail?: string) {
    super(message, 400, detail);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Unauthorized') {
    super(message, 401);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, detail?: string) {
    super(message, 409, detail);
  }
}

/** The client went away before the turn finished; nothing is persisted. */
export class RequestAbortedError extends AppError {
  constructor() {
    super('Request aborted by client', 499);
  }
}

/** Raised by the generation layer; the stage controller maps it to the fallback reply. */
export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationError';
  }
}

export class GenerationTimeoutError extends GenerationError {
  constructor(timeoutMs: number) {
    super(`Generation timed out after ${timeoutMs}ms`);
    this.name = 'GenerationTimeoutError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
