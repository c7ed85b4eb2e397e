/**
 * Custom error classes for structured error handling.
 *
 * Usage:
 *   throw new ValidationError("Invalid input", [{ field: "paths", message: "Too many documents" }])
 *   throw new UnsupportedFileTypeError("image/png")
 *
 * At the command-line boundary:
 *   catch (error) {
 *     const appError = toAppError(error)
 *     console.error(JSON.stringify(appError.toJSON()))
 *     process.exitCode = 1
 *   }
 */

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "INTERNAL_ERROR"
  // Engine and review pipeline
  | "CATALOG_INVALID"
  | "EXTRACTION_FAILED"
  | "UNSUPPORTED_FILE_TYPE"
  | "ENCRYPTED_DOCUMENT"
  | "CORRUPT_DOCUMENT"
  | "OCR_REQUIRED"

export interface ErrorDetail {
  field?: string
  message: string
  code?: string
}

export interface SerializedError {
  code: ErrorCode
  message: string
  details?: ErrorDetail[]
}

/**
 * Base application error class.
 * All custom errors extend this for consistent handling.
 */
export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetail[]
  ) {
    super(message)
    this.name = this.constructor.name
    Object.setPrototypeOf(this, new.target.prototype)
    Error.captureStackTrace(this, this.constructor)
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    }
  }
}

/**
 * Validation Error - Input validation failed
 */
export class ValidationError extends AppError {
  constructor(message = "Validation failed", details?: ErrorDetail[]) {
    super("VALIDATION_ERROR", message, details)
  }

  static fromZodError(error: {
    issues: Array<{ path: (string | number)[]; message: string }>
  }): ValidationError {
    const details = error.issues.map((e) => ({
      field: e.path.join("."),
      message: e.message,
    }))
    return new ValidationError("Validation failed", details)
  }
}

/**
 * Not Found - File or resource doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super("NOT_FOUND", message)
  }
}

/**
 * Internal Error - Unexpected error
 */
export class InternalError extends AppError {
  constructor(message = "An unexpected error occurred") {
    super("INTERNAL_ERROR", message)
  }
}

/**
 * Catalog Invalid - a pattern table failed validation at load
 */
export class CatalogError extends AppError {
  constructor(message = "Pattern catalog is invalid", details?: ErrorDetail[]) {
    super("CATALOG_INVALID", message, details)
  }
}

/**
 * Extraction Failed - text could not be pulled from a document
 */
export class ExtractionFailedError extends AppError {
  constructor(message = "Text extraction failed", details?: ErrorDetail[]) {
    super("EXTRACTION_FAILED", message, details)
  }
}

/**
 * Unsupported File Type
 */
export class UnsupportedFileTypeError extends AppError {
  constructor(public readonly mimeType: string) {
    super("UNSUPPORTED_FILE_TYPE", `Unsupported file type: ${mimeType}`)
  }
}

/**
 * Encrypted Document - password-protected input
 */
export class EncryptedDocumentError extends AppError {
  constructor(message = "Document is password-protected") {
    super("ENCRYPTED_DOCUMENT", message)
  }
}

/**
 * Corrupt Document - the file could not be parsed
 */
export class CorruptDocumentError extends AppError {
  constructor(message = "Document could not be read") {
    super("CORRUPT_DOCUMENT", message)
  }
}

/**
 * OCR Required - scanned document with no text layer
 */
export class OcrRequiredError extends AppError {
  constructor(message = "Document has no text layer and would need OCR") {
    super("OCR_REQUIRED", message)
  }
}

/**
 * Type guard to check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

/**
 * Convert any error to an AppError for consistent handling.
 * Preserves AppErrors, wraps others in InternalError.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error
  }

  if (error instanceof Error) {
    const message =
      process.env.NODE_ENV === "production"
        ? "An unexpected error occurred"
        : error.message

    return new InternalError(message)
  }

  return new InternalError("An unexpected error occurred")
}
