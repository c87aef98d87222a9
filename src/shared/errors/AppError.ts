/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Two kinds of failure reach the edges of the app:
 *
 *   1. Operational errors - expected problems such as "schema not digested",
 *      "OpenAI request timed out" or "relation does not exist". The HTTP error
 *      handler returns their statusCode and message; the CLI prints the
 *      message and moves on to the next question.
 *
 *   2. Programmer errors - anything else. These get a generic 500 / a logged
 *      stack trace.
 *
 * `isOperational` separates the two. `Object.setPrototypeOf(this,
 * new.target.prototype)` keeps `instanceof` working for subclasses when the
 * code is compiled down to CommonJS.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Nothing to work with: no tables in the schema, or none relevant to a question. */
export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

/** Required settings are missing; raised before any external service is touched. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}

/** A call to OpenAI, Qdrant or the database driver failed. */
export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(service: string, message: string, cause?: unknown) {
    super(`${service} request failed: ${message}`, 502);
    this.service = service;
    if (cause !== undefined) this.cause = cause;
  }
}

/** The generated SQL was sent to the database and rejected there. */
export class SqlExecutionError extends AppError {
  public readonly sql: string;

  constructor(message: string, sql: string) {
    super(`Error executing query: ${message}`, 422);
    this.sql = sql;
  }
}

/** Renders any thrown value as a single line. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
