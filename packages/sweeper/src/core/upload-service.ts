import type { TimeSource } from "@mpusweep/clock"
import type { PartialFailureError } from "@mpusweep/errors"
import type { Filter } from "../model/filter"
import type { Bytes, RegionName, UploadRecord } from "../model/upload-record"
import type { CostBreakdown, CostEstimator } from "../ports/collaborators"
import type { DeleteSelector, ListResult, ListScope } from "../ports/scope"
import type {
  DeletionOutcome,
  Deleter,
  FilterEngine,
  RegionCacheStats,
  RegionResolver,
  SizeCalculator,
  UploadLister,
} from "../ports/services"
import { type AgeBucket, ageDistribution } from "./reports/age-distribution"
import { buildSizeReport, type SizeReport } from "./size/size-report"

export type MultipartUploadServiceDeps = {
  lister: UploadLister
  sizes: SizeCalculator
  deleter: Deleter
  filters: FilterEngine
  regions: RegionResolver
  costs: CostEstimator
  clock: TimeSource
}

export interface SizeReportResult {
  report: SizeReport

  /** Listing failures; the report covers every bucket that did list. */
  error?: PartialFailureError
}

/** What callers of the sweeper see. Each operation delegates to one component. */
export class MultipartUploadService {
  constructor(private readonly deps: MultipartUploadServiceDeps) {}

  listUploads(scope: ListScope = {}, signal?: AbortSignal): Promise<ListResult> {
    return this.deps.lister.list(scope, signal)
  }

  getUploadSize(record: UploadRecord, signal?: AbortSignal): Promise<Bytes> {
    return this.deps.sizes.sizeOf(record, signal)
  }

  deleteUpload(record: UploadRecord, signal?: AbortSignal): Promise<void> {
    return this.deps.deleter.deleteOne(record, signal)
  }

  deleteUploads(
    records: readonly UploadRecord[],
    selector: DeleteSelector,
    signal?: AbortSignal,
  ): Promise<DeletionOutcome> {
    return this.deps.deleter.deleteMany(records, selector, signal)
  }

  parseFilter(query: string): Filter {
    return this.deps.filters.parse(query)
  }

  applyFilter(records: readonly UploadRecord[], filter: Filter): UploadRecord[] {
    return this.deps.filters.apply(records, filter)
  }

  validateFilter(query: string): void {
    this.deps.filters.validate(query)
  }

  async sizeReport(scope: ListScope = {}, signal?: AbortSignal): Promise<SizeReportResult> {
    const listed = await this.deps.lister.list(scope, signal)
    const sized = await this.deps.sizes.sizeAll(listed.uploads, signal)
    const report = buildSizeReport(sized.uploads, sized.inaccessibleBuckets)

    return listed.error ? { report, error: listed.error } : { report }
  }

  ageDistribution(records: readonly UploadRecord[]): AgeBucket[] {
    return ageDistribution(records, this.deps.clock.nowMs())
  }

  estimateCost(records: readonly UploadRecord[]): Promise<CostBreakdown> {
    return this.deps.costs.estimateMonthlyCost(records)
  }

  resolveRegion(bucket: string, signal?: AbortSignal): Promise<RegionName> {
    return this.deps.regions.resolve(bucket, signal)
  }

  clearRegionCache(): void {
    this.deps.regions.clear()
  }

  regionCacheStats(): RegionCacheStats {
    return this.deps.regions.stats()
  }
}
