import type { Milliseconds, UnixMs } from "@mpusweep/clock"
import type { Bytes, UploadRecord } from "../../model/upload-record"
import { DAY_MS } from "../units/age"

export type AgeBucketLabel = "1 day" | "1 week" | "1 month" | "3 months" | "6 months" | "1 year+"

export interface AgeBucket {
  label: AgeBucketLabel

  /** Inclusive lower bound. */
  minAgeMs: Milliseconds

  /** Exclusive upper bound; Infinity for the last bucket. */
  maxAgeMs: Milliseconds

  count: number
  size: Bytes
}

const ranges: ReadonlyArray<readonly [AgeBucketLabel, Milliseconds, Milliseconds]> = [
  ["1 day", 0, DAY_MS],
  ["1 week", DAY_MS, 7 * DAY_MS],
  ["1 month", 7 * DAY_MS, 30 * DAY_MS],
  ["3 months", 30 * DAY_MS, 90 * DAY_MS],
  ["6 months", 90 * DAY_MS, 180 * DAY_MS],
  ["1 year+", 180 * DAY_MS, Number.POSITIVE_INFINITY],
]

export function ageOf(record: Pick<UploadRecord, "initiated">, now: UnixMs): Milliseconds {
  return now - record.initiated.getTime()
}

export function isOlderThan(
  record: Pick<UploadRecord, "initiated">,
  ageMs: Milliseconds,
  now: UnixMs,
): boolean {
  return ageOf(record, now) >= ageMs
}

/**
 * Counts records per age band. Every band is present, empty ones included.
 * Uploads initiated in the future land in the first band.
 */
export function ageDistribution(records: readonly UploadRecord[], now: UnixMs): AgeBucket[] {
  const buckets: AgeBucket[] = ranges.map(([label, minAgeMs, maxAgeMs]) => ({
    label,
    minAgeMs,
    maxAgeMs,
    count: 0,
    size: 0,
  }))

  for (const record of records) {
    const age = Math.max(0, ageOf(record, now))
    const bucket = buckets.find((b) => age >= b.minAgeMs && age < b.maxAgeMs)

    if (bucket) {
      bucket.count += 1
      bucket.size += record.size
    }
  }

  return buckets
}
