import type { DeletionResult, DryRunResult, ProgressSnapshot } from "../../../ports/collaborators"
import { mockLogger } from "../../../tests/mock"
import { MB, NOW, uploadRecord } from "../../../tests/records"
import { LoggerDeletionReporter } from "../logger-deletion-reporter"

const snapshot = (overrides: Partial<ProgressSnapshot> = {}): ProgressSnapshot => ({
  total: 4,
  processed: 2,
  succeeded: 1,
  failed: 1,
  startedAt: new Date(NOW),
  elapsedMs: 1500,
  ...overrides,
})

describe("LoggerDeletionReporter", () => {
  it("logs progress with the bucket in flight", () => {
    const logger = mockLogger()

    new LoggerDeletionReporter({ logger }).progress(snapshot({ currentBucket: "logs" }))

    expect(logger.child).toHaveBeenCalledWith({ component: "deletion-reporter" })
    expect(logger.info).toHaveBeenCalledWith("deletion progress", {
      total: 4,
      processed: 2,
      succeeded: 1,
      failed: 1,
      durationMs: 1500,
      bucket: "logs",
    })
  })

  it("logs the outcome and one warning per reported failure", () => {
    const logger = mockLogger()
    const result: DeletionResult = {
      totalProcessed: 4,
      succeeded: 3,
      failed: 1,
      bytesFreed: 30 * MB,
      durationMs: 2000,
      errors: [
        { bucket: "logs", key: "a.bin", uploadId: "a-id", message: "Access Denied", error: new Error("Access Denied") },
      ],
    }

    new LoggerDeletionReporter({ logger }).completed(snapshot({ processed: 4 }), result)

    expect(logger.info).toHaveBeenCalledWith("deletion completed", {
      total: 4,
      processed: 4,
      succeeded: 3,
      failed: 1,
      bytes: 30 * MB,
      durationMs: 2000,
    })
    expect(logger.warn).toHaveBeenCalledExactlyOnceWith("Access Denied", {
      bucket: "logs",
      key: "a.bin",
      uploadId: "a-id",
    })
  })

  it("logs a dry run per bucket", () => {
    const logger = mockLogger()
    const result: DryRunResult = {
      totalUploads: 2,
      totalSize: 3 * MB,
      estimatedSavings: 0.0042,
      currency: "USD",
      byBucket: { logs: { count: 2, size: 3 * MB, savings: 0.0042 } },
      byRegion: {},
      byStorageClass: {},
      uploads: [uploadRecord(), uploadRecord()],
      generatedAt: new Date(NOW),
      filters: "bucket=logs",
    }

    new LoggerDeletionReporter({ logger }).dryRun(result)

    expect(logger.info).toHaveBeenNthCalledWith(
      1,
      "dry run (filters: bucket=logs), estimated savings 0.00 USD/month",
      { total: 2, bytes: 3 * MB },
    )
    expect(logger.info).toHaveBeenNthCalledWith(2, "would delete", { bucket: "logs", total: 2, bytes: 3 * MB })
  })
})
