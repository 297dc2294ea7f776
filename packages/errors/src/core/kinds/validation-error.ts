import { BaseError } from "../base-error"

export type ValidationErrorCode = "validation_failed"

/**
 * Malformed input caught before any work starts. Never retried.
 */
export class ValidationError extends BaseError<ValidationErrorCode> {
  constructor(message: string, context: Readonly<Record<string, unknown>> = {}) {
    super(message, { code: "validation_failed", context, isRetryable: false })
  }

  static field(field: string, reason: string, value?: unknown): ValidationError {
    return new ValidationError(`${field} ${reason}`, {
      field,
      ...(value !== undefined && { value }),
    })
  }
}
