import { type Clock, SystemClock } from "@mpusweep/clock"
import { TokenBucket } from "@mpusweep/concurrency"
import { createPinoLogger, type Logger } from "@mpusweep/logger"
import { createRetryExecutor } from "@mpusweep/retry"
import { StaticCostEstimator } from "../adapters/cost/static-cost-estimator"
import { createStdioConfirmationPrompt } from "../adapters/prompt/readline-confirmation-prompt"
import { LoggerDeletionReporter } from "../adapters/reporting/logger-deletion-reporter"
import { createS3Client, S3StorageApi } from "../adapters/s3/s3-storage-api"
import { RetryingStorageApi } from "../core/client/retrying-storage-api"
import { UploadCollector } from "../core/collector/upload-collector"
import { DeletionEngine } from "../core/deletion/deletion-engine"
import { QueryFilterEngine } from "../core/filter/filter-engine"
import { CachingRegionResolver } from "../core/region/region-resolver"
import { RegionalClientRegistry } from "../core/region/regional-client-registry"
import { PartSizeCalculator } from "../core/size/size-calculator"
import { MultipartUploadService } from "../core/upload-service"
import type { RegionName } from "../model/upload-record"
import type { ConfirmationPrompt, CostEstimator, DeletionReporter } from "../ports/collaborators"
import type { MultipartStorageApi } from "../ports/storage-api"
import type { SweeperConfig } from "./config/schema"

export type SweeperOverrides = {
  clock?: Clock
  logger?: Logger

  /** Raw provider access per region. Defaults to an S3 client pinned to the region. */
  storageApiFor?: (region: RegionName) => MultipartStorageApi

  costs?: CostEstimator
  confirmation?: ConfirmationPrompt
  reporter?: DeletionReporter
}

export type Sweeper = {
  service: MultipartUploadService
  logger: Logger
  clock: Clock
}

/**
 * Wires every component. Each region gets its own client and its own rate
 * limiter; the home region's client also enumerates buckets and resolves
 * their locations.
 */
export function createSweeper(config: SweeperConfig, overrides: SweeperOverrides = {}): Sweeper {
  const clock = overrides.clock ?? new SystemClock()
  const logger =
    overrides.logger ??
    createPinoLogger({
      level: config.logging.level,
      prettify: config.logging.prettify,
      service: config.logging.serviceName,
    })

  const retry = createRetryExecutor({ clock })
  const storageApiFor =
    overrides.storageApiFor ??
    ((region: RegionName) =>
      new S3StorageApi({
        client: createS3Client({
          region,
          ...(config.aws.profile !== undefined && { profile: config.aws.profile }),
        }),
      }))

  const clientFor = (region: RegionName): MultipartStorageApi =>
    new RetryingStorageApi(
      {
        api: storageApiFor(region),
        limiter: new TokenBucket({ clock }, { ratePerSecond: config.sweep.rateLimitPerSecond }),
        retry,
        logger: logger.child({ region }),
      },
      { retry: config.retry },
    )

  const home = clientFor(config.aws.region)
  const clients = new RegionalClientRegistry({
    factory: (region) => (region === config.aws.region ? home : clientFor(region)),
    logger,
  })
  const regions = new CachingRegionResolver(
    { api: home, clock, logger },
    { ttlMs: config.sweep.regionCacheTtlMs },
  )
  const costs = overrides.costs ?? new StaticCostEstimator()
  const concurrency = config.sweep.concurrency

  const service = new MultipartUploadService({
    lister: new UploadCollector({ api: home, regions, clients, logger }, { concurrency }),
    sizes: new PartSizeCalculator({ clients, logger }, { concurrency }),
    deleter: new DeletionEngine(
      {
        clients,
        costs,
        confirmation: overrides.confirmation ?? createStdioConfirmationPrompt(),
        reporter: overrides.reporter ?? new LoggerDeletionReporter({ logger }),
        clock,
        logger,
      },
      {
        concurrency,
        progressIntervalMs: config.sweep.progressIntervalMs,
        maxReportedErrors: config.sweep.maxReportedErrors,
      },
    ),
    filters: new QueryFilterEngine({ clock }),
    regions,
    costs,
    clock,
  })

  logger.info("sweeper ready", { region: config.aws.region })

  return { service, logger, clock }
}
