import { BaseError, describeError, PartialFailureError } from "@mpusweep/errors"
import type { DeletionResult } from "../ports/collaborators"

export type RemoteErrorCode = "remote_not_found" | "remote_failed"

/**
 * A storage call that failed for good: the resource is gone, or the error
 * is not one worth retrying.
 */
export class RemoteOperationError extends BaseError<RemoteErrorCode> {
  static notFound(operation: string, cause: unknown, target?: string): RemoteOperationError {
    return new RemoteOperationError(`${operation} failed: ${describeError(cause)}`, {
      code: "remote_not_found",
      context: { operation, ...(target !== undefined && { target }) },
      cause,
    })
  }

  static failed(operation: string, cause: unknown, target?: string): RemoteOperationError {
    return new RemoteOperationError(`${operation} failed: ${describeError(cause)}`, {
      code: "remote_failed",
      context: { operation, ...(target !== undefined && { target }) },
      cause,
    })
  }
}

export class ConfirmationDeclinedError extends BaseError<"confirmation_declined"> {
  constructor(uploads: number) {
    super("deletion cancelled by user", {
      code: "confirmation_declined",
      context: { uploads },
    })
  }
}

export class NoMatchingUploadsError extends BaseError<"no_matching_uploads"> {
  constructor(candidates: number, filters: string) {
    super("no uploads match the specified criteria", {
      code: "no_matching_uploads",
      context: { candidates, filters },
    })
  }
}

/** Some aborts failed. Successful ones are not rolled back. */
export class BatchDeletionError extends PartialFailureError {
  constructor(readonly result: DeletionResult) {
    super(`failed to delete ${result.failed} out of ${result.totalProcessed} uploads`, {
      failed: result.failed,
      total: result.totalProcessed,
      errors: result.errors.map((e) => e.error),
    })
  }
}
