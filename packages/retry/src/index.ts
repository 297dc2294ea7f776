export {
  type CreateBackoffOptions,
  createBackoff,
  type ExponentialBackoffOptions,
  exponentialBackoff,
} from "./core/backoff/create-backoff"
export { type ExponentialOptions, exponential } from "./core/backoff/exponential"
export {
  createRetryExecutor,
  type IRetryExecutor,
  RetryExecutor,
  type RetryExecutorDeps,
} from "./core/retry-executor"
export type { AttemptContext, RetryAttemptInfo } from "./ports/attempt-context"
export type { Delay, DelayPolicy } from "./ports/delay-policy"
export type { RetryObserver } from "./ports/observer"
export type { ErrorPredicate, RetryConfig, RetryFn } from "./ports/retry-config"
