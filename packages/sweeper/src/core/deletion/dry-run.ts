import type { TimeSource } from "@mpusweep/clock"
import type { UploadRecord } from "../../model/upload-record"
import type { CostEstimator, DryRunGroup, DryRunResult } from "../../ports/collaborators"
import type { DeleteSelector } from "../../ports/scope"
import { describeSelector } from "./delete-selector"

export type DryRunDeps = {
  costs: CostEstimator
  clock: TimeSource
}

type Grouping = { groups: Record<string, DryRunGroup>; keyOf: (record: UploadRecord) => string }

async function groupSavings(
  records: readonly UploadRecord[],
  { groups, keyOf }: Grouping,
  costs: CostEstimator,
): Promise<void> {
  const members = new Map<string, UploadRecord[]>()

  for (const record of records) {
    const key = keyOf(record)
    members.set(key, [...(members.get(key) ?? []), record])
  }

  for (const [key, group] of members) {
    groups[key] = {
      count: group.length,
      size: group.reduce((sum, r) => sum + r.size, 0),
      savings: await costs.estimateSavings(group),
    }
  }
}

/**
 * What deleting `records` would free and save. Nothing is touched. Each
 * breakdown asks the estimator for its own group, so no cost line has to
 * be matched back to a record.
 */
export async function simulateDeletion(
  records: readonly UploadRecord[],
  selector: DeleteSelector,
  deps: DryRunDeps,
): Promise<DryRunResult> {
  const result: DryRunResult = {
    totalUploads: records.length,
    totalSize: records.reduce((sum, r) => sum + r.size, 0),
    estimatedSavings: await deps.costs.estimateSavings(records),
    currency: "USD",
    byBucket: {},
    byRegion: {},
    byStorageClass: {},
    uploads: [...records],
    generatedAt: deps.clock.now(),
    filters: describeSelector(selector),
  }

  const groupings: Grouping[] = [
    { groups: result.byBucket, keyOf: (r) => r.bucket },
    { groups: result.byRegion, keyOf: (r) => r.region },
    { groups: result.byStorageClass, keyOf: (r) => r.storageClass },
  ]

  for (const grouping of groupings) await groupSavings(records, grouping, deps.costs)

  return result
}
