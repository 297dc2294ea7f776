import type { Filter } from "../model/filter"
import type { BucketRef, Bytes, RegionName, UploadRecord } from "../model/upload-record"
import type { DeletionResult, DryRunResult } from "./collaborators"
import type { DeleteSelector, ListResult, ListScope, SizedBatch } from "./scope"

export interface UploadLister {
  list(scope?: ListScope, signal?: AbortSignal): Promise<ListResult>
}

export interface SizeCalculator {
  sizeOf(record: UploadRecord, signal?: AbortSignal): Promise<Bytes>

  /**
   * Sizes every record in place. Records that could not be sized are left
   * out and their buckets listed; the batch itself does not fail.
   */
  sizeAll(records: readonly UploadRecord[], signal?: AbortSignal): Promise<SizedBatch>
}

export type DeletionOutcome =
  | { kind: "dry_run"; result: DryRunResult }
  | { kind: "deleted"; result: DeletionResult }

export interface Deleter {
  deleteOne(record: UploadRecord, signal?: AbortSignal): Promise<void>
  deleteMany(
    records: readonly UploadRecord[],
    selector: DeleteSelector,
    signal?: AbortSignal,
  ): Promise<DeletionOutcome>
}

export interface RegionCacheStats {
  cachedRegions: number
  ttlMs: number
}

export interface RegionResolver {
  resolve(bucket: string, signal?: AbortSignal): Promise<RegionName>
  lookup(bucket: string): BucketRef | undefined
  clear(): void
  stats(): RegionCacheStats
}

export interface FilterEngine {
  parse(query: string): Filter
  apply(records: readonly UploadRecord[], filter: Filter): UploadRecord[]
  validate(query: string): void
}
