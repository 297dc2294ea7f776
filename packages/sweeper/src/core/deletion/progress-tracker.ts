import type { TimeSource, UnixMs } from "@mpusweep/clock"
import { describeError } from "@mpusweep/errors"
import type { BucketName, Bytes, UploadRecord } from "../../model/upload-record"
import type { DeletionFailure, DeletionResult, ProgressSnapshot } from "../../ports/collaborators"

export type ProgressTrackerOptions = {
  total: number

  /** Failures kept verbatim for the result. */
  maxReportedErrors: number
}

/**
 * Counters for one deletion batch. Workers record outcomes as they settle;
 * the reporter reads snapshots on its own schedule.
 */
export class ProgressTracker {
  private readonly startedAt: UnixMs
  private processed = 0
  private succeeded = 0
  private failed = 0
  private bytesFreed: Bytes = 0
  private currentBucket: BucketName | undefined
  private readonly errors: DeletionFailure[] = []

  constructor(
    private readonly clock: TimeSource,
    private readonly opts: ProgressTrackerOptions,
  ) {
    this.startedAt = clock.nowMs()
  }

  started(record: UploadRecord): void {
    this.currentBucket = record.bucket
  }

  succeededWith(record: UploadRecord): void {
    this.processed += 1
    this.succeeded += 1
    this.bytesFreed += record.size
  }

  failedWith(record: UploadRecord, error: unknown): void {
    this.processed += 1
    this.failed += 1

    if (this.errors.length < this.opts.maxReportedErrors) {
      this.errors.push({
        bucket: record.bucket,
        key: record.key,
        uploadId: record.uploadId,
        message: describeError(error),
        error,
      })
    }
  }

  snapshot(): ProgressSnapshot {
    return {
      total: this.opts.total,
      processed: this.processed,
      succeeded: this.succeeded,
      failed: this.failed,
      ...(this.currentBucket !== undefined && { currentBucket: this.currentBucket }),
      startedAt: new Date(this.startedAt),
      elapsedMs: this.clock.nowMs() - this.startedAt,
    }
  }

  result(): DeletionResult {
    return {
      totalProcessed: this.processed,
      succeeded: this.succeeded,
      failed: this.failed,
      bytesFreed: this.bytesFreed,
      durationMs: this.clock.nowMs() - this.startedAt,
      errors: [...this.errors],
    }
  }
}
