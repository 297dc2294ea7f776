import { type Clock, isAbortError, type Milliseconds, raceAbort } from "@mpusweep/clock"
import { MemorySingleflight } from "@mpusweep/concurrency"
import { AbortedError, ValidationError } from "@mpusweep/errors"
import type { Logger } from "@mpusweep/logger"
import { type BucketRef, DEFAULT_REGION, type RegionName } from "../../model/upload-record"
import type { RegionCacheStats, RegionResolver } from "../../ports/services"
import type { MultipartStorageApi } from "../../ports/storage-api"

export const DEFAULT_REGION_CACHE_TTL_MS: Milliseconds = 60 * 60 * 1000

export type CachingRegionResolverDeps = {
  api: MultipartStorageApi
  clock: Clock
  logger: Logger
}

export type CachingRegionResolverOptions = {
  ttlMs?: Milliseconds
  defaultRegion?: RegionName
}

/**
 * Maps a location constraint to a region name. An empty constraint means
 * the provider's home region; `EU` is the legacy alias of eu-west-1.
 */
export function normalizeLocation(
  constraint: string | undefined,
  defaultRegion: RegionName = DEFAULT_REGION,
): RegionName {
  if (!constraint) return defaultRegion
  if (constraint === "EU") return "eu-west-1"

  return constraint
}

/**
 * Bucket → region with a per-entry TTL. Concurrent misses for one bucket
 * share a single lookup; failed lookups are not cached.
 */
export class CachingRegionResolver implements RegionResolver {
  private readonly cache = new Map<string, BucketRef>()
  private readonly lookups = new MemorySingleflight<BucketRef>()
  private readonly ttlMs: Milliseconds
  private readonly defaultRegion: RegionName
  private readonly logger: Logger

  constructor(
    private readonly deps: CachingRegionResolverDeps,
    opts: CachingRegionResolverOptions = {},
  ) {
    this.ttlMs = opts.ttlMs ?? DEFAULT_REGION_CACHE_TTL_MS
    this.defaultRegion = opts.defaultRegion ?? DEFAULT_REGION
    this.logger = deps.logger.child({ component: "region-resolver" })

    if (!Number.isFinite(this.ttlMs) || this.ttlMs <= 0) {
      throw ValidationError.field("regionCacheTtlMs", "must be a finite number > 0", this.ttlMs)
    }
  }

  async resolve(bucket: string, signal?: AbortSignal): Promise<RegionName> {
    if (!bucket) throw ValidationError.field("bucket", "must not be empty")

    const cached = this.lookup(bucket)
    if (cached) return cached.region

    if (signal?.aborted) throw AbortedError.fromSignal(signal, "region lookup")

    // The shared lookup carries no caller's signal; each caller stops waiting on its own.
    const flight = this.lookups.run(bucket, () => this.fetch(bucket))

    try {
      const { value } = await raceAbort(flight, signal)
      return value.region
    } catch (error) {
      if (isAbortError(error) && signal?.aborted) {
        throw AbortedError.fromSignal(signal, "region lookup")
      }
      throw error
    }
  }

  /** Fresh cache entry for `bucket`, if any. */
  lookup(bucket: string): BucketRef | undefined {
    const entry = this.cache.get(bucket)
    if (!entry) return undefined

    if (this.deps.clock.nowMs() - entry.resolvedAt >= this.ttlMs) return undefined

    return { ...entry }
  }

  clear(): void {
    this.cache.clear()
  }

  stats(): RegionCacheStats {
    return { cachedRegions: this.cache.size, ttlMs: this.ttlMs }
  }

  private async fetch(bucket: string): Promise<BucketRef> {
    const constraint = await this.deps.api.getBucketLocation(bucket)

    const ref: BucketRef = {
      name: bucket,
      region: normalizeLocation(constraint, this.defaultRegion),
      resolvedAt: this.deps.clock.nowMs(),
    }

    this.cache.set(bucket, ref)
    this.logger.debug("bucket region resolved", { bucket, region: ref.region })

    return { ...ref }
  }
}
