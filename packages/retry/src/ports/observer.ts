import type { AttemptContext, RetryAttemptInfo } from "./attempt-context"

/**
 * Lifecycle hooks, typically for logging. A throwing hook fails the call.
 */
export interface RetryObserver {
  onRetry?(error: unknown, info: RetryAttemptInfo): void | Promise<void>
  onExhausted?(error: unknown, info: RetryAttemptInfo): void | Promise<void>
  onAborted?(ctx: AttemptContext): void | Promise<void>
}
