import type { UnixMs } from "@mpusweep/clock"
import { ValidationError } from "@mpusweep/errors"

export type Bytes = number
export type BucketName = string
export type RegionName = string

export const DEFAULT_REGION: RegionName = "us-east-1"
export const DEFAULT_STORAGE_CLASS = "STANDARD"

/**
 * One incomplete multipart upload.
 *
 * Everything except `size` is fixed once the collector builds the record.
 * `size` starts at 0 and is overwritten once by batch sizing.
 */
export interface UploadRecord {
  readonly bucket: BucketName
  readonly key: string
  readonly uploadId: string
  readonly initiated: Date
  readonly storageClass: string
  readonly region: RegionName
  size: Bytes
}

export interface BucketRef {
  readonly name: BucketName
  readonly region: RegionName
  readonly resolvedAt: UnixMs
}

export function validateUploadRecord(record: UploadRecord): void {
  if (!record.bucket) throw ValidationError.field("bucket", "must not be empty")
  if (!record.key) throw ValidationError.field("key", "must not be empty", record.bucket)
  if (!record.uploadId) throw ValidationError.field("uploadId", "must not be empty", record.key)

  if (!(record.initiated instanceof Date) || Number.isNaN(record.initiated.getTime())) {
    throw ValidationError.field("initiated", "must be a valid timestamp", record.uploadId)
  }

  if (!Number.isSafeInteger(record.size) || record.size < 0) {
    throw ValidationError.field("size", "must be a non-negative integer", record.size)
  }
}
