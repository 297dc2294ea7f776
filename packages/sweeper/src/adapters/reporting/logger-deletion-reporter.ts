import type { Logger } from "@mpusweep/logger"
import type {
  DeletionReporter,
  DeletionResult,
  DryRunResult,
  ProgressSnapshot,
} from "../../ports/collaborators"

export type LoggerDeletionReporterDeps = {
  logger: Logger
}

export class LoggerDeletionReporter implements DeletionReporter {
  private readonly logger: Logger

  constructor(deps: LoggerDeletionReporterDeps) {
    this.logger = deps.logger.child({ component: "deletion-reporter" })
  }

  progress(snapshot: ProgressSnapshot): void {
    this.logger.info("deletion progress", {
      total: snapshot.total,
      processed: snapshot.processed,
      succeeded: snapshot.succeeded,
      failed: snapshot.failed,
      durationMs: snapshot.elapsedMs,
      ...(snapshot.currentBucket !== undefined && { bucket: snapshot.currentBucket }),
    })
  }

  completed(snapshot: ProgressSnapshot, result: DeletionResult): void {
    this.logger.info("deletion completed", {
      total: snapshot.total,
      processed: result.totalProcessed,
      succeeded: result.succeeded,
      failed: result.failed,
      bytes: result.bytesFreed,
      durationMs: result.durationMs,
    })

    for (const failure of result.errors) {
      this.logger.warn(failure.message, {
        bucket: failure.bucket,
        key: failure.key,
        uploadId: failure.uploadId,
      })
    }
  }

  dryRun(result: DryRunResult): void {
    const savings = `${result.estimatedSavings.toFixed(2)} ${result.currency}/month`

    this.logger.info(`dry run (filters: ${result.filters}), estimated savings ${savings}`, {
      total: result.totalUploads,
      bytes: result.totalSize,
    })

    for (const [bucket, group] of Object.entries(result.byBucket)) {
      this.logger.info("would delete", { bucket, total: group.count, bytes: group.size })
    }
  }
}
