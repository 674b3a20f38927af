/**
 * Base error for everything the service raises on purpose.
 *
 * `statusCode` is what the HTTP layer answers with. `isOperational` is false
 * only for errors that mean the code (or an upstream contract it relies on)
 * is wrong; the error handler logs those at error level instead of warn.
 * Errors that are not AppErrors at all are bugs and become a bare 500.
 */
export interface ErrorResponseBody {
  status: 'error';
  error: string;
  message: string;
}

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode = 500,
    public readonly isOperational = true,
  ) {
    super(message);
    this.name = new.target.name;
    // keeps instanceof working on subclasses when compiled to ES5-style classes
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, new.target);
  }

  toResponseBody(): ErrorResponseBody {
    return { status: 'error', error: this.name, message: this.message };
  }
}

/** Bad caller input: a request body, a CLI flag, a chunk span. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}
