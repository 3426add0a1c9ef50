import {
  BaseError,
  DatabaseError,
  ForeignKeyConstraintError,
  UniqueConstraintError,
  ValidationError as SequelizeValidationError,
} from "sequelize";
import type { ZodError } from "zod";

export type AppErrorCode = "NOT_FOUND" | "CONFLICT" | "VALIDATION_FAILED" | "STORAGE_FAILURE";

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: AppErrorCode,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 409, "CONFLICT", details);
    this.name = "ConflictError";
  }
}

export class ValidationFailureError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, "VALIDATION_FAILED", details);
    this.name = "ValidationError";
  }
}

export class StorageFailureError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, "STORAGE_FAILURE");
    this.name = "StorageFailureError";
    this.cause = cause;
  }
}

export function throwValidation(msg: string, details?: unknown): never {
  throw new ValidationFailureError(msg, details);
}

export const fromZodError = (error: ZodError, message = "Validation failed") =>
  new ValidationFailureError(
    message,
    error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
  );

/**
 * Normalises anything thrown below a route into the error taxonomy.
 * Sequelize errors are classified by kind; unknown errors become storage failures
 * only when they came from the database layer, otherwise they pass through unchanged.
 */
export const toAppError = (err: unknown): AppError | Error => {
  if (err instanceof AppError) return err;
  if (err instanceof UniqueConstraintError) {
    return new ConflictError(
      "A record with the same unique value already exists",
      err.errors.map((item) => item.path)
    );
  }
  if (err instanceof SequelizeValidationError) {
    return new ValidationFailureError(
      "Validation failed",
      err.errors.map((item) => ({ path: item.path, message: item.message }))
    );
  }
  if (err instanceof ForeignKeyConstraintError) {
    return new ValidationFailureError("Referenced record does not exist", err.fields);
  }
  if (err instanceof DatabaseError || err instanceof BaseError) {
    return new StorageFailureError("Database operation failed", err);
  }
  if (err instanceof Error) return err;
  return new Error(String(err));
};
