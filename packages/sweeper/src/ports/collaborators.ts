import type { Milliseconds } from "@mpusweep/clock"
import type { BucketName, Bytes, RegionName, UploadRecord } from "../model/upload-record"

export type Currency = "USD"

export interface CostLine {
  record: UploadRecord
  pricePerGbMonth: number
  monthlyCost: number
}

export interface CostBreakdown {
  totalMonthlyCost: number
  byRegion: Record<RegionName, number>
  byStorageClass: Record<string, number>
  lines: CostLine[]
  currency: Currency
}

export interface CostEstimator {
  estimateMonthlyCost(records: readonly UploadRecord[]): Promise<CostBreakdown>

  /** Monthly storage cost that deleting `records` would stop. */
  estimateSavings(records: readonly UploadRecord[]): Promise<number>
}

export interface ConfirmationSummary {
  uploads: number
  totalSize: Bytes
  buckets: number

  /** Uploads per bucket; only present for 10 buckets or fewer. */
  perBucket?: Record<BucketName, number>
}

export interface ConfirmationPrompt {
  /** Resolves true only on an explicit yes. */
  confirm(summary: ConfirmationSummary, signal?: AbortSignal): Promise<boolean>
}

export interface ProgressSnapshot {
  total: number
  processed: number
  succeeded: number
  failed: number
  currentBucket?: BucketName
  startedAt: Date
  elapsedMs: Milliseconds
}

export interface DeletionFailure {
  bucket: BucketName
  key: string
  uploadId: string
  message: string
  error: unknown
}

export interface DeletionResult {
  totalProcessed: number
  succeeded: number
  failed: number
  bytesFreed: Bytes
  durationMs: Milliseconds

  /** First failures only; `failed` holds the full count. */
  errors: DeletionFailure[]
}

export interface DryRunGroup {
  count: number
  size: Bytes
  savings: number
}

export interface DryRunResult {
  totalUploads: number
  totalSize: Bytes
  estimatedSavings: number
  currency: Currency
  byBucket: Record<BucketName, DryRunGroup>
  byRegion: Record<RegionName, DryRunGroup>
  byStorageClass: Record<string, DryRunGroup>
  uploads: UploadRecord[]
  generatedAt: Date

  /** Human-readable selector, e.g. `bucket=logs, older than 7d`. */
  filters: string
}

export interface DeletionReporter {
  progress(snapshot: ProgressSnapshot): void
  completed(snapshot: ProgressSnapshot, result: DeletionResult): void
  dryRun(result: DryRunResult): void
}
