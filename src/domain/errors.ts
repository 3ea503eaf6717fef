/**
 * Errors raised by the session pipeline
 *
 * Structural errors carry the HTTP status they map to. DecodeError and
 * ClassificationError are per-frame: callers record them and move on.
 */

export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

export class BadRequestError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NoFramesError extends AppError {
  constructor(message = 'No frames found') {
    super(message, 400);
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Session not found') {
    super(message, 404);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(message = 'File too large') {
    super(message, 413);
  }
}

export class StorageError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class DecodeError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ClassificationError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}

/**
 * Message text of anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
