import {
  DEFAULT_CONCURRENCY,
  partitionSettled,
  runBounded,
  type Settled,
  validateConcurrency,
} from "@mpusweep/concurrency"
import { PartialFailureError, ValidationError } from "@mpusweep/errors"
import type { Logger } from "@mpusweep/logger"
import {
  type BucketName,
  DEFAULT_STORAGE_CLASS,
  type RegionName,
  type UploadRecord,
} from "../../model/upload-record"
import type { ListResult, ListScope } from "../../ports/scope"
import type { RegionResolver, UploadLister } from "../../ports/services"
import type { MultipartStorageApi, UploadSession } from "../../ports/storage-api"
import type { RegionalClientRegistry } from "../region/regional-client-registry"

/** Largest page the provider serves. */
export const MAX_UPLOADS_PER_PAGE = 1000

/** Bucket failures logged one by one before the rest are only counted. */
const LOGGED_FAILURES = 3

export type UploadCollectorDeps = {
  /** Region-agnostic client used to enumerate buckets. */
  api: MultipartStorageApi
  regions: RegionResolver
  clients: RegionalClientRegistry
  logger: Logger
}

export type UploadCollectorOptions = {
  concurrency?: number
}

type BucketTarget = { name: BucketName; region: RegionName }

type BucketFailure = { bucket: BucketName; error: unknown }

export function validateScope(scope: ListScope): void {
  if (scope.bucket === "") throw ValidationError.field("bucket", "must not be empty")
  if (scope.region === "") throw ValidationError.field("region", "must not be empty")

  for (const field of ["offset", "maxResults"] as const) {
    const value = scope[field]

    if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
      throw ValidationError.field(field, "must be a non-negative integer", value)
    }
  }
}

export function toUploadRecord(session: UploadSession, target: BucketTarget): UploadRecord | null {
  if (!session.key || !session.uploadId || !session.initiated) return null

  return {
    bucket: target.name,
    key: session.key,
    uploadId: session.uploadId,
    initiated: session.initiated,
    storageClass: session.storageClass || DEFAULT_STORAGE_CLASS,
    region: target.region,
    size: 0,
  }
}

/**
 * Enumerates incomplete uploads across buckets. Buckets are listed
 * concurrently; one failing bucket does not stop the others, and failures
 * come back as a single PartialFailureError next to the records that were
 * collected.
 */
export class UploadCollector implements UploadLister {
  private readonly concurrency: number
  private readonly logger: Logger

  constructor(
    private readonly deps: UploadCollectorDeps,
    opts: UploadCollectorOptions = {},
  ) {
    this.concurrency = validateConcurrency(opts.concurrency ?? DEFAULT_CONCURRENCY)
    this.logger = deps.logger.child({ component: "collector" })
  }

  async list(scope: ListScope = {}, signal?: AbortSignal): Promise<ListResult> {
    validateScope(scope)

    const offset = scope.offset ?? 0
    const cap = scope.maxResults ? offset + scope.maxResults : undefined

    const result = scope.bucket
      ? await this.listSingle(scope.bucket, scope.region, cap, signal)
      : await this.listAll(scope.region, cap, signal)

    const end = scope.maxResults ? offset + scope.maxResults : undefined

    return { ...result, uploads: result.uploads.slice(offset, end) }
  }

  private async listSingle(
    bucket: BucketName,
    regionFilter: RegionName | undefined,
    cap: number | undefined,
    signal?: AbortSignal,
  ): Promise<ListResult> {
    const region = await this.deps.regions.resolve(bucket, signal)

    if (regionFilter && region !== regionFilter) return { uploads: [] }

    return { uploads: await this.listBucket({ name: bucket, region }, cap, signal) }
  }

  private async listAll(
    regionFilter: RegionName | undefined,
    cap: number | undefined,
    signal?: AbortSignal,
  ): Promise<ListResult> {
    const buckets = await this.deps.api.listBuckets(signal)
    const names = buckets.flatMap((b) => (b.name ? [b.name] : []))
    const run = { concurrency: this.concurrency, ...(signal && { signal }) }
    const failures: BucketFailure[] = []

    let listed: Settled<BucketName, UploadRecord[]>[]

    if (regionFilter) {
      const located = partitionSettled(
        await runBounded(names, (name, s) => this.deps.regions.resolve(name, s), run),
      )
      failures.push(...located.rejected.map((r) => ({ bucket: r.item, error: r.error })))

      const matching = new Map(
        located.fulfilled.filter((r) => r.value === regionFilter).map((r) => [r.item, r.value]),
      )

      listed = await runBounded(
        [...matching.keys()],
        (name, s) => this.listBucket({ name, region: regionFilter }, cap, s),
        run,
      )
    } else {
      listed = await runBounded(
        names,
        async (name, s) => {
          const region = await this.deps.regions.resolve(name, s)
          return this.listBucket({ name, region }, cap, s)
        },
        run,
      )
    }

    const { fulfilled, rejected } = partitionSettled(listed)
    failures.push(...rejected.map((r) => ({ bucket: r.item, error: r.error })))

    const uploads = fulfilled.sort((a, b) => a.index - b.index).flatMap((r) => r.value)

    this.logger.info("buckets listed", {
      total: names.length,
      succeeded: fulfilled.length,
      failed: failures.length,
    })

    if (failures.length === 0) return { uploads }

    return { uploads, error: this.aggregate(failures, names.length) }
  }

  private async listBucket(
    target: BucketTarget,
    cap: number | undefined,
    signal?: AbortSignal,
  ): Promise<UploadRecord[]> {
    const client = await this.deps.clients.clientFor(target.region)
    const uploads: UploadRecord[] = []

    let keyMarker: string | undefined
    let uploadIdMarker: string | undefined

    for (;;) {
      const remaining = cap === undefined ? undefined : cap - uploads.length
      if (remaining !== undefined && remaining <= 0) break

      const page = await client.listUploadSessions(
        {
          bucket: target.name,
          ...(keyMarker !== undefined && { keyMarker }),
          ...(uploadIdMarker !== undefined && { uploadIdMarker }),
          ...(remaining !== undefined && {
            maxUploads: Math.min(remaining, MAX_UPLOADS_PER_PAGE),
          }),
        },
        signal,
      )

      for (const session of page.sessions) {
        const record = toUploadRecord(session, target)
        if (record) uploads.push(record)
      }

      if (!page.isTruncated) break
      if (page.nextKeyMarker === undefined && page.nextUploadIdMarker === undefined) break

      keyMarker = page.nextKeyMarker
      uploadIdMarker = page.nextUploadIdMarker
    }

    this.logger.debug("bucket listed", {
      bucket: target.name,
      region: target.region,
      total: uploads.length,
    })

    return cap === undefined ? uploads : uploads.slice(0, cap)
  }

  private aggregate(failures: BucketFailure[], total: number): PartialFailureError {
    for (const failure of failures.slice(0, LOGGED_FAILURES)) {
      this.logger.warn("failed to list uploads for bucket", {
        bucket: failure.bucket,
        err: failure.error,
      })
    }

    if (failures.length > LOGGED_FAILURES) {
      this.logger.warn(`... and ${failures.length - LOGGED_FAILURES} more errors`, {
        failed: failures.length,
      })
    }

    return new PartialFailureError(
      `failed to list uploads for ${failures.length} of ${total} buckets`,
      {
        failed: failures.length,
        total,
        errors: failures.map((f) => f.error),
      },
    )
  }
}
