import type { Milliseconds } from "@mpusweep/clock"
import type { PartialFailureError } from "@mpusweep/errors"
import type { BucketName, Bytes, RegionName, UploadRecord } from "../model/upload-record"

export interface ListScope {
  /** Only this bucket. */
  bucket?: BucketName

  /** Only buckets located in this region. */
  region?: RegionName

  /** Records to skip after merging. Default: 0 */
  offset?: number

  /** Records to return after merging; 0 or absent means all. */
  maxResults?: number
}

export interface ListResult {
  uploads: UploadRecord[]

  /** Set when some buckets failed; `uploads` still holds the rest. */
  error?: PartialFailureError
}

/**
 * @remarks
 * When both bounds are set they describe a band, so `smallerThan` must be
 * strictly greater than `largerThan`.
 */
export interface DeleteSelector {
  bucket?: BucketName

  /** Minimum age. */
  olderThanMs?: Milliseconds

  /** Keep uploads of this size or more. */
  smallerThan?: Bytes

  /** Keep uploads of this size or less. */
  largerThan?: Bytes

  /** Skip the confirmation prompt. */
  force?: boolean

  /** Report what would be deleted and touch nothing. */
  dryRun?: boolean
}

export interface SizedBatch {
  uploads: UploadRecord[]

  /** Buckets with at least one record that could not be sized. */
  inaccessibleBuckets: BucketName[]
}
