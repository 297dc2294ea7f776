import { BaseError } from "../base-error"

export type AbortedErrorCode = "aborted"

export class AbortedError extends BaseError<AbortedErrorCode> {
  constructor(operation?: string, cause?: unknown) {
    super(operation ? `${operation} aborted` : "operation aborted", {
      code: "aborted",
      context: operation ? { operation } : {},
      cause,
      isRetryable: false,
    })
  }

  static fromSignal(signal: AbortSignal | undefined, operation?: string): AbortedError {
    return new AbortedError(operation, signal?.reason)
  }
}
