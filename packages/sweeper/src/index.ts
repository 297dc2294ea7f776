export {
  FALLBACK_PRICE_PER_GB_MONTH,
  normalizeStorageClass,
  parsePricing,
  type PricingTable,
  StaticCostEstimator,
  type StaticCostEstimatorOptions,
} from "./adapters/cost/static-cost-estimator"
export {
  CONFIRMATION_QUESTION,
  createStdioConfirmationPrompt,
  formatSummary,
  isAffirmative,
  ReadlineConfirmationPrompt,
  type ReadlineConfirmationPromptDeps,
} from "./adapters/prompt/readline-confirmation-prompt"
export { LoggerDeletionReporter } from "./adapters/reporting/logger-deletion-reporter"
export { createS3Client, type CreateS3ClientOptions, S3StorageApi } from "./adapters/s3/s3-storage-api"
export { Config, loadConfig } from "./app/config/load-config"
export { loadSweeperConfig, mapEnvToConfig } from "./app/config/load-sweeper-config"
export { type EnvConfig, envSchema, type SweeperConfig } from "./app/config/schema"
export { type ConfigSource, EnvSource, ObjectSource } from "./app/config/sources"
export { createSweeper, type Sweeper, type SweeperOverrides } from "./app/create-sweeper"
export { classifyStorageError, type StorageErrorClass } from "./core/client/classify-error"
export {
  DEFAULT_RETRY_SETTINGS,
  RetryingStorageApi,
  type RetrySettings,
} from "./core/client/retrying-storage-api"
export { UploadCollector } from "./core/collector/upload-collector"
export { describeSelector, selectForDeletion, validateSelector } from "./core/deletion/delete-selector"
export { DeletionEngine, summarize } from "./core/deletion/deletion-engine"
export { simulateDeletion } from "./core/deletion/dry-run"
export { formatFilter, parseFilter } from "./core/filter/parse-filter"
export { matchesFilter } from "./core/filter/evaluate-filter"
export { QueryFilterEngine } from "./core/filter/filter-engine"
export { CachingRegionResolver, normalizeLocation } from "./core/region/region-resolver"
export { RegionalClientRegistry } from "./core/region/regional-client-registry"
export { type AgeBucket, ageDistribution, isOlderThan } from "./core/reports/age-distribution"
export { PartSizeCalculator } from "./core/size/size-calculator"
export { buildSizeReport, type SizeGroup, type SizeReport } from "./core/size/size-report"
export { formatAge, parseAge } from "./core/units/age"
export { formatBytes, parseSize } from "./core/units/bytes"
export { MultipartUploadService, type SizeReportResult } from "./core/upload-service"
export {
  type ComparisonOperator,
  comparisonOperators,
  type EqualityOperator,
  type Filter,
  type FilterField,
  filterFields,
  type NumericPredicate,
  type StringPredicate,
} from "./model/filter"
export {
  BatchDeletionError,
  ConfirmationDeclinedError,
  NoMatchingUploadsError,
  RemoteOperationError,
} from "./model/sweep.errors"
export {
  type BucketName,
  type BucketRef,
  type Bytes,
  DEFAULT_REGION,
  DEFAULT_STORAGE_CLASS,
  type RegionName,
  type UploadRecord,
  validateUploadRecord,
} from "./model/upload-record"
export type * from "./ports/collaborators"
export type * from "./ports/scope"
export type * from "./ports/services"
export type * from "./ports/storage-api"
