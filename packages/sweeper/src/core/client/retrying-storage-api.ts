import type { RateLimiter } from "@mpusweep/concurrency"
import { BaseError } from "@mpusweep/errors"
import type { LogMeta, Logger } from "@mpusweep/logger"
import { type DelayPolicy, exponentialBackoff, type IRetryExecutor } from "@mpusweep/retry"
import { RemoteOperationError } from "../../model/sweep.errors"
import type {
  BucketSummary,
  ListUploadPartsInput,
  ListUploadSessionsInput,
  MultipartStorageApi,
  UploadLocator,
  UploadPartPage,
  UploadSessionPage,
} from "../../ports/storage-api"
import { classifyStorageError } from "./classify-error"

export type RetrySettings = {
  maxRetries: number
  baseDelayMs: number
  factor: number
  maxDelayMs: number
}

export const DEFAULT_RETRY_SETTINGS: RetrySettings = {
  maxRetries: 3,
  baseDelayMs: 100,
  factor: 2,
  maxDelayMs: 30_000,
}

export type RetryingStorageApiDeps = {
  api: MultipartStorageApi
  limiter: RateLimiter
  retry: IRetryExecutor
  logger: Logger
}

export type RetryingStorageApiOptions = {
  retry?: Partial<RetrySettings>
}

/**
 * Every call takes a rate-limit token per attempt and retries transient
 * failures with capped exponential backoff. Permanent failures surface as
 * RemoteOperationError, exhausted ones as RetryExhaustedError.
 */
export class RetryingStorageApi implements MultipartStorageApi {
  private readonly settings: RetrySettings
  private readonly delay: DelayPolicy
  private readonly logger: Logger

  constructor(
    private readonly deps: RetryingStorageApiDeps,
    opts: RetryingStorageApiOptions = {},
  ) {
    this.settings = { ...DEFAULT_RETRY_SETTINGS, ...opts.retry }
    this.delay = exponentialBackoff({
      baseMs: this.settings.baseDelayMs,
      factor: this.settings.factor,
      maxDelayMs: this.settings.maxDelayMs,
    })
    this.logger = deps.logger.child({ component: "storage-client" })
  }

  listBuckets(signal?: AbortSignal): Promise<BucketSummary[]> {
    return this.call("listBuckets", {}, (s) => this.deps.api.listBuckets(s), signal)
  }

  getBucketLocation(bucket: string, signal?: AbortSignal): Promise<string | undefined> {
    return this.call(
      "getBucketLocation",
      { bucket },
      (s) => this.deps.api.getBucketLocation(bucket, s),
      signal,
    )
  }

  listUploadSessions(
    input: ListUploadSessionsInput,
    signal?: AbortSignal,
  ): Promise<UploadSessionPage> {
    return this.call(
      "listUploadSessions",
      { bucket: input.bucket },
      (s) => this.deps.api.listUploadSessions(input, s),
      signal,
    )
  }

  listUploadParts(input: ListUploadPartsInput, signal?: AbortSignal): Promise<UploadPartPage> {
    return this.call(
      "listUploadParts",
      { bucket: input.bucket, key: input.key, uploadId: input.uploadId },
      (s) => this.deps.api.listUploadParts(input, s),
      signal,
    )
  }

  abortUpload(upload: UploadLocator, signal?: AbortSignal): Promise<void> {
    return this.call(
      "abortUpload",
      { bucket: upload.bucket, key: upload.key, uploadId: upload.uploadId },
      (s) => this.deps.api.abortUpload(upload, s),
      signal,
    )
  }

  private async call<T>(
    operation: string,
    meta: LogMeta,
    fn: (signal?: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    try {
      return await this.deps.retry.execute(
        async () => {
          await this.deps.limiter.acquire(signal)
          return fn(signal)
        },
        {
          maxRetries: this.settings.maxRetries,
          delay: this.delay,
          operation,
          ...(signal && { signal }),
          errorPredicate: {
            shouldRetry: (error) => classifyStorageError(error) === "retryable",
          },
          observer: {
            onRetry: (error, info) => {
              this.logger.warn("retrying storage call", {
                ...meta,
                operation,
                attempt: info.attempt + 1,
                delayMs: info.nextDelayMs ?? 0,
                err: error,
              })
            },
            onExhausted: (error, info) => {
              this.logger.error("storage call retries exhausted", {
                ...meta,
                operation,
                attempt: info.attempt + 1,
                err: error,
              })
            },
          },
        },
      )
    } catch (error) {
      throw this.toDomainError(operation, error, meta.bucket)
    }
  }

  private toDomainError(operation: string, error: unknown, target?: string): unknown {
    if (error instanceof BaseError) return error

    return classifyStorageError(error) === "not_found"
      ? RemoteOperationError.notFound(operation, error, target)
      : RemoteOperationError.failed(operation, error, target)
  }
}
