import { BaseError, describeError } from "../base-error"

export type RetryExhaustedErrorCode = "retry_exhausted"

export class RetryExhaustedError extends BaseError<RetryExhaustedErrorCode> {
  readonly retries: number
  readonly attempts: number

  constructor(input: { lastError: unknown; retries: number; attempts: number }) {
    super(`operation failed after ${input.retries} retries: ${describeError(input.lastError)}`, {
      code: "retry_exhausted",
      context: { retries: input.retries, attempts: input.attempts },
      cause: input.lastError,
      isRetryable: false,
    })

    this.retries = input.retries
    this.attempts = input.attempts
  }
}
