import type { AttemptContext } from "./attempt-context"
import type { DelayPolicy } from "./delay-policy"
import type { RetryObserver } from "./observer"

export interface ErrorPredicate {
  shouldRetry(error: unknown, ctx: AttemptContext): boolean
}

/**
 * @remarks
 * `maxRetries` counts retries, not attempts: attempts run `0..maxRetries`,
 * so `maxRetries = 3` allows up to four calls. Without an `errorPredicate`
 * every failure is retried.
 */
export interface RetryConfig {
  maxRetries: number
  delay: DelayPolicy
  errorPredicate?: ErrorPredicate
  observer?: RetryObserver
  signal?: AbortSignal

  /** Name used in abort errors. */
  operation?: string
}

export type RetryFn<T> = (ctx: AttemptContext) => Promise<T>
