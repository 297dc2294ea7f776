import type { Clock, Milliseconds } from "@mpusweep/clock"
import { DEFAULT_CONCURRENCY, runBounded, validateConcurrency } from "@mpusweep/concurrency"
import { ValidationError } from "@mpusweep/errors"
import type { Logger } from "@mpusweep/logger"
import {
  BatchDeletionError,
  ConfirmationDeclinedError,
  NoMatchingUploadsError,
} from "../../model/sweep.errors"
import { type UploadRecord, validateUploadRecord } from "../../model/upload-record"
import type {
  ConfirmationPrompt,
  ConfirmationSummary,
  CostEstimator,
  DeletionReporter,
} from "../../ports/collaborators"
import type { DeleteSelector } from "../../ports/scope"
import type { DeletionOutcome, Deleter } from "../../ports/services"
import type { RegionalClientRegistry } from "../region/regional-client-registry"
import { describeSelector, selectForDeletion, validateSelector } from "./delete-selector"
import { simulateDeletion } from "./dry-run"
import { ProgressTracker } from "./progress-tracker"

export const DEFAULT_PROGRESS_INTERVAL_MS: Milliseconds = 1000
export const DEFAULT_MAX_REPORTED_ERRORS = 10

/** Above this many buckets the confirmation summary drops the per-bucket counts. */
const PER_BUCKET_SUMMARY_LIMIT = 10

export type DeletionEngineDeps = {
  clients: RegionalClientRegistry
  costs: CostEstimator
  confirmation: ConfirmationPrompt
  reporter: DeletionReporter
  clock: Clock
  logger: Logger
}

export type DeletionEngineOptions = {
  concurrency?: number
  progressIntervalMs?: Milliseconds
  maxReportedErrors?: number
}

export function summarize(records: readonly UploadRecord[]): ConfirmationSummary {
  const perBucket: Record<string, number> = {}
  let totalSize = 0

  for (const record of records) {
    perBucket[record.bucket] = (perBucket[record.bucket] ?? 0) + 1
    totalSize += record.size
  }

  const buckets = Object.keys(perBucket).length

  return {
    uploads: records.length,
    totalSize,
    buckets,
    ...(buckets <= PER_BUCKET_SUMMARY_LIMIT && { perBucket }),
  }
}

/**
 * Aborts selected uploads. Each abort is an independent remote call: a
 * failed one does not undo the others, and the batch reports them together
 * once everything has settled.
 */
export class DeletionEngine implements Deleter {
  private readonly concurrency: number
  private readonly progressIntervalMs: Milliseconds
  private readonly maxReportedErrors: number
  private readonly logger: Logger

  constructor(
    private readonly deps: DeletionEngineDeps,
    opts: DeletionEngineOptions = {},
  ) {
    this.concurrency = validateConcurrency(opts.concurrency ?? DEFAULT_CONCURRENCY)
    this.progressIntervalMs = opts.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS
    this.maxReportedErrors = opts.maxReportedErrors ?? DEFAULT_MAX_REPORTED_ERRORS
    this.logger = deps.logger.child({ component: "deletion-engine" })

    if (!Number.isFinite(this.progressIntervalMs) || this.progressIntervalMs <= 0) {
      throw ValidationError.field("progressIntervalMs", "must be > 0", this.progressIntervalMs)
    }

    if (!Number.isInteger(this.maxReportedErrors) || this.maxReportedErrors < 0) {
      throw ValidationError.field(
        "maxReportedErrors",
        "must be a non-negative integer",
        this.maxReportedErrors,
      )
    }
  }

  async deleteOne(record: UploadRecord, signal?: AbortSignal): Promise<void> {
    validateUploadRecord(record)

    const client = await this.deps.clients.clientFor(record.region)

    await client.abortUpload(
      { bucket: record.bucket, key: record.key, uploadId: record.uploadId },
      signal,
    )
  }

  async deleteMany(
    records: readonly UploadRecord[],
    selector: DeleteSelector,
    signal?: AbortSignal,
  ): Promise<DeletionOutcome> {
    validateSelector(selector)

    const selected = selectForDeletion(records, selector, this.deps.clock.nowMs())

    if (selected.length === 0) {
      throw new NoMatchingUploadsError(records.length, describeSelector(selector))
    }

    if (selector.dryRun) {
      const result = await simulateDeletion(selected, selector, this.deps)
      this.deps.reporter.dryRun(result)

      return { kind: "dry_run", result }
    }

    if (!selector.force) {
      const confirmed = await this.deps.confirmation.confirm(summarize(selected), signal)
      if (!confirmed) throw new ConfirmationDeclinedError(selected.length)
    }

    const tracker = await this.execute(selected, signal)
    const result = tracker.result()

    this.logger.info("deletion finished", {
      total: selected.length,
      succeeded: result.succeeded,
      failed: result.failed,
      bytes: result.bytesFreed,
      durationMs: result.durationMs,
    })

    if (result.failed > 0) throw new BatchDeletionError(result)

    return { kind: "deleted", result }
  }

  private async execute(
    records: readonly UploadRecord[],
    signal?: AbortSignal,
  ): Promise<ProgressTracker> {
    const { reporter } = this.deps
    const tracker = new ProgressTracker(this.deps.clock, {
      total: records.length,
      maxReportedErrors: this.maxReportedErrors,
    })

    this.logger.info("deleting uploads", { total: records.length })

    const ticker = setInterval(() => reporter.progress(tracker.snapshot()), this.progressIntervalMs)
    ticker.unref()

    try {
      await runBounded(
        records,
        async (record, s) => {
          tracker.started(record)
          await this.deleteOne(record, s)
        },
        {
          concurrency: this.concurrency,
          ...(signal && { signal }),
          onSettled: (settled) => {
            if (settled.ok) {
              tracker.succeededWith(settled.item)
              return
            }

            tracker.failedWith(settled.item, settled.error)
            this.logger.warn("abort failed", {
              bucket: settled.item.bucket,
              key: settled.item.key,
              uploadId: settled.item.uploadId,
              err: settled.error,
            })
          },
        },
      )
    } finally {
      clearInterval(ticker)

      const final = tracker.snapshot()
      reporter.progress(final)
      reporter.completed(final, tracker.result())
    }

    return tracker
  }
}
