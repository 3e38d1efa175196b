// src/lib/errors.ts
import type { ApiError } from "../middleware/errorHandler";

export class AppError extends Error implements ApiError {
  statusCode: number;
  details?: Record<string, unknown>;

  constructor(message: string, statusCode = 500, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.details = details;
  }
}

// Source bytes missing, or not a spreadsheet container
export class SourceUnreadableError extends AppError {
  constructor(message: string) {
    super(message, 422);
  }
}

export class TemplateNotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class UnknownCombinationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class MissingInputError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class UploadRejectedError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ValidationFailedError extends AppError {
  readonly errors: string[];
  readonly warnings: string[];

  constructor(errors: string[], warnings: string[]) {
    super(`Validation failed: ${errors.join("; ")}`, 422, { errors, warnings });
    this.errors = errors;
    this.warnings = warnings;
  }
}
