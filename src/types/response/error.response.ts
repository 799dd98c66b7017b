/**
 * Errors raised by services and translated to HTTP responses by controllers
 * and the error middleware. `status` follows the HTTP status code.
 */
export class AppError extends Error {
  public readonly status: number;
  public readonly details: string | null;

  constructor(message: string, status = 500, details: string | null = null) {
    super(message);
    this.name = this.constructor.name;
    this.status = status;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, details: string | null = null) {
    super(message, 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

/** Raised for sheet geometry that cannot produce a printable page. */
export class SheetConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}

/** Raised when a catalog YAML file does not hold the expected records. */
export class CatalogFormatError extends AppError {
  public readonly file: string;

  constructor(file: string, message: string) {
    super(`${file}: ${message}`, 422);
    this.file = file;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : "Unknown error occurred";
