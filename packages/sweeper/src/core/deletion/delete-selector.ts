import type { UnixMs } from "@mpusweep/clock"
import { ValidationError } from "@mpusweep/errors"
import type { UploadRecord } from "../../model/upload-record"
import type { DeleteSelector } from "../../ports/scope"
import { isOlderThan } from "../reports/age-distribution"
import { formatAge } from "../units/age"
import { formatBytes } from "../units/bytes"

/** Rejects selectors that can never match before anything is listed or deleted. */
export function validateSelector(selector: DeleteSelector): void {
  if (selector.bucket === "") throw ValidationError.field("bucket", "must not be empty")

  for (const field of ["olderThanMs", "smallerThan", "largerThan"] as const) {
    const value = selector[field]

    if (value !== undefined && (!Number.isFinite(value) || value < 0)) {
      throw ValidationError.field(field, "must be a non-negative number", value)
    }
  }

  const { smallerThan, largerThan } = selector

  if (smallerThan !== undefined && largerThan !== undefined && smallerThan <= largerThan) {
    throw ValidationError.field(
      "smallerThan",
      `must be greater than largerThan (${formatBytes(largerThan)})`,
      smallerThan,
    )
  }
}

export function selectForDeletion(
  records: readonly UploadRecord[],
  selector: DeleteSelector,
  now: UnixMs,
): UploadRecord[] {
  const { bucket, olderThanMs, smallerThan, largerThan } = selector

  return records.filter(
    (record) =>
      (bucket === undefined || record.bucket === bucket) &&
      (olderThanMs === undefined || isOlderThan(record, olderThanMs, now)) &&
      (smallerThan === undefined || record.size < smallerThan) &&
      (largerThan === undefined || record.size > largerThan),
  )
}

/** `bucket=logs, older than 7d, smaller than 50.0 MB`; `none` when unset. */
export function describeSelector(selector: DeleteSelector): string {
  const parts: string[] = []

  if (selector.bucket !== undefined) parts.push(`bucket=${selector.bucket}`)
  if (selector.olderThanMs !== undefined) parts.push(`older than ${formatAge(selector.olderThanMs)}`)
  if (selector.smallerThan !== undefined) parts.push(`smaller than ${formatBytes(selector.smallerThan)}`)
  if (selector.largerThan !== undefined) parts.push(`larger than ${formatBytes(selector.largerThan)}`)

  return parts.length > 0 ? parts.join(", ") : "none"
}
