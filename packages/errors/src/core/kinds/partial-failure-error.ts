import { BaseError, describeError } from "../base-error"

export type PartialFailureErrorCode = "partial_failure"

/** How many individual failures a PartialFailureError keeps verbatim. */
export const PARTIAL_FAILURE_SAMPLE_LIMIT = 3

/**
 * Some units of a fan-out failed while others succeeded. Travels alongside
 * whatever partial result was produced.
 */
export class PartialFailureError extends BaseError<PartialFailureErrorCode> {
  readonly failed: number
  readonly total: number
  readonly errors: readonly unknown[]

  constructor(message: string, input: { failed: number; total: number; errors: readonly unknown[] }) {
    const samples = input.errors.slice(0, PARTIAL_FAILURE_SAMPLE_LIMIT)

    super(message, {
      code: "partial_failure",
      context: {
        failed: input.failed,
        total: input.total,
        samples: samples.map(describeError),
      },
      cause: samples[0],
      isRetryable: false,
    })

    this.failed = input.failed
    this.total = input.total
    this.errors = samples
  }
}
