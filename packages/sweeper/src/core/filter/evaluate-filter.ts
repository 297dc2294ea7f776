import type { UnixMs } from "@mpusweep/clock"
import type { ComparisonOperator, Filter, StringPredicate } from "../../model/filter"
import type { UploadRecord } from "../../model/upload-record"
import { HOUR_MS } from "../units/age"

/** Age equality matches anything within this distance of the target. */
export const AGE_TOLERANCE_MS = HOUR_MS

function compare(actual: number, op: ComparisonOperator, expected: number): boolean {
  switch (op) {
    case ">":
      return actual > expected
    case "<":
      return actual < expected
    case ">=":
      return actual >= expected
    case "<=":
      return actual <= expected
    case "=":
      return actual === expected
    case "!=":
      return actual !== expected
  }
}

function compareAge(ageMs: number, op: ComparisonOperator, expected: number): boolean {
  if (op === "=") return Math.abs(ageMs - expected) <= AGE_TOLERANCE_MS
  if (op === "!=") return Math.abs(ageMs - expected) > AGE_TOLERANCE_MS

  return compare(ageMs, op, expected)
}

function compareText(actual: string, predicate: StringPredicate): boolean {
  const equal = actual.toLowerCase() === predicate.raw.toLowerCase()
  return predicate.op === "=" ? equal : !equal
}

export function matchesFilter(record: UploadRecord, filter: Filter, now: UnixMs): boolean {
  const { age, size, storageClass, region, bucket } = filter

  if (age && !compareAge(now - record.initiated.getTime(), age.op, age.value)) return false
  if (size && !compare(record.size, size.op, size.value)) return false
  if (storageClass && !compareText(record.storageClass, storageClass)) return false
  if (region && !compareText(record.region, region)) return false
  if (bucket && !compareText(record.bucket, bucket)) return false

  return true
}
