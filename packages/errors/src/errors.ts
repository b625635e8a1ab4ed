import { AppError } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Fatal, startup-time misconfiguration (bad vector dimension, overlap >= chunk size,
 * invalid environment or rule file). The process must refuse to start.
 */
export class ConfigurationError extends AppError {
  constructor(message = "Invalid configuration", options?: ErrorExtras) {
    super({
      message,
      statusCode: 500,
      code: "CONFIGURATION_ERROR",
      isOperational: false,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

/** An embedding or inference backend could not be reached. */
export class BackendUnavailableError extends AppError {
  public readonly service: string;

  constructor(message = "Backend unavailable", service: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 503,
      code: "BACKEND_UNAVAILABLE",
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

export class DimensionMismatchError extends AppError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number, options?: ErrorExtras) {
    super({
      message: `Vector dimension mismatch: expected ${String(expected)}, got ${String(actual)}`,
      statusCode: 422,
      code: "DIMENSION_MISMATCH",
      details: options?.details,
      cause: options?.cause,
    });
    this.expected = expected;
    this.actual = actual;
  }
}

export class EmptyInputError extends AppError {
  constructor(message = "Input text must not be blank", options?: ErrorExtras) {
    super({
      message,
      statusCode: 400,
      code: "EMPTY_INPUT",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorExtras) {
    super({
      message,
      statusCode: 404,
      code: "NOT_FOUND",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: ErrorExtras) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}
