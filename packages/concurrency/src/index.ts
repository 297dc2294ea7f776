export { MemorySingleflight } from "./adapters/memory/memory-single-flight"
export { KeyedOnce } from "./core/keyed-once"
export {
  DEFAULT_CONCURRENCY,
  MAX_CONCURRENCY,
  MIN_CONCURRENCY,
  partitionSettled,
  runBounded,
  validateConcurrency,
} from "./core/run-bounded"
export { TokenBucket, type TokenBucketDeps, type TokenBucketOptions } from "./core/token-bucket"
export type { RateLimiter } from "./ports/rate-limiter"
export type { FlightResult, InFlightKey, Singleflight } from "./ports/single-flight"
export type { BoundedRunOptions, Settled, Worker } from "./ports/worker-pool"
