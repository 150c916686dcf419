/**
 * Error taxonomy shared by the stores, the domain services and the HTTP boundary.
 *
 * Stores raise only these classes (never driver errors), services re-wrap store
 * failures with operation-specific messages, and the boundary turns any of them
 * into a JSON response through `sendErrorResponse`.
 */

import type { ZodError } from "zod";

export interface ErrorDetail {
  field: string;
  message: string;
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: ErrorDetail[];

  constructor(message: string, statusCode: number = 500, code: string = "INTERNAL_ERROR", details?: ErrorDetail[]) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetail[]) {
    super(message, 400, "VALIDATION_ERROR", details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, "NOT_FOUND");
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, "CONFLICT");
  }
}

export class StorageError extends AppError {
  constructor(message: string) {
    super(message, 500, "STORAGE_ERROR");
  }
}

/**
 * Missing fields are reported together in the message ("Missing required field(s): email, name");
 * any other issue falls back to a generic message with every issue kept in `details`.
 */
export function fromZodError(error: ZodError): ValidationError {
  const details: ErrorDetail[] = error.errors.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
  }));

  const missing = error.errors
    .filter((issue) => issue.code === "invalid_type" && issue.received === "undefined")
    .map((issue) => issue.path.join("."));

  if (missing.length > 0) {
    return new ValidationError(`Missing required field(s): ${missing.join(", ")}`, details);
  }

  const first = details[0];
  const message = first ? `Invalid value for ${first.field || "input"}: ${first.message}` : "Invalid input";
  return new ValidationError(message, details);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Keep typed errors as they are and re-wrap anything else with an operation prefix.
 */
export function wrapStorageFailure(error: unknown, operation: string): AppError {
  if (error instanceof AppError && !(error instanceof StorageError)) {
    return error;
  }
  return new StorageError(`Failed to ${operation}: ${errorMessage(error)}`);
}

/** Structural subset of an Express response. */
export interface ErrorResponder {
  status(code: number): { json(body: unknown): unknown };
}

export function sendErrorResponse(res: ErrorResponder, error: unknown): void {
  const appError = error instanceof AppError ? error : new AppError("Internal Server Error");
  res.status(appError.statusCode).json({
    success: false,
    error: appError.message,
    code: appError.code,
    ...(appError.details ? { details: appError.details } : {}),
  });
}
