import { type Clock, isAbortError } from "@mpusweep/clock"
import { AbortedError, RetryExhaustedError, ValidationError } from "@mpusweep/errors"
import type { AttemptContext, RetryAttemptInfo } from "../ports/attempt-context"
import type { RetryConfig, RetryFn } from "../ports/retry-config"

export type RetryExecutorDeps = {
  clock: Clock
}

export interface IRetryExecutor {
  /**
   * Runs `fn` until it succeeds, fails with an error the predicate rejects,
   * or runs out of retries.
   *
   * - non-retryable errors are rethrown unchanged
   * - exhaustion throws RetryExhaustedError wrapping the last failure
   * - an abort before an attempt or during a backoff throws AbortedError
   */
  execute<T>(fn: RetryFn<T>, config: RetryConfig): Promise<T>
}

export function createRetryExecutor(deps: RetryExecutorDeps): IRetryExecutor {
  return new RetryExecutor(deps)
}

export class RetryExecutor implements IRetryExecutor {
  constructor(private readonly deps: RetryExecutorDeps) {}

  async execute<T>(fn: RetryFn<T>, config: RetryConfig): Promise<T> {
    this.validateConfig(config)

    const { maxRetries, delay, errorPredicate, observer, signal, operation } = config
    const startedAt = this.deps.clock.nowMs()

    let lastError: unknown
    let lastCtx = this.buildContext(0, startedAt, signal)

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const ctx = this.buildContext(attempt, startedAt, signal)
      lastCtx = ctx

      if (signal?.aborted) {
        await observer?.onAborted?.(ctx)
        throw AbortedError.fromSignal(signal, operation)
      }

      try {
        return await fn(ctx)
      } catch (error) {
        if (error instanceof AbortedError) throw error
        if (isAbortError(error) && signal?.aborted) {
          throw new AbortedError(operation, error)
        }

        lastError = error

        if (!(errorPredicate?.shouldRetry(error, ctx) ?? true)) throw error
        if (attempt === maxRetries) break

        const nextDelayMs = delay.getDelay(attempt).milliseconds
        await observer?.onRetry?.(error, this.buildInfo(ctx, nextDelayMs))

        await this.sleep(nextDelayMs, signal, operation)
      }
    }

    await observer?.onExhausted?.(lastError, this.buildInfo(lastCtx, null))

    throw new RetryExhaustedError({
      lastError,
      retries: maxRetries,
      attempts: maxRetries + 1,
    })
  }

  private async sleep(ms: number, signal: AbortSignal | undefined, operation?: string) {
    if (ms <= 0) return

    try {
      await this.deps.clock.sleep(ms, signal)
    } catch (error) {
      if (isAbortError(error)) throw new AbortedError(operation, error)
      throw error
    }
  }

  private validateConfig(config: RetryConfig): void {
    if (!Number.isInteger(config.maxRetries) || config.maxRetries < 0) {
      throw ValidationError.field("maxRetries", "must be an integer >= 0", config.maxRetries)
    }
  }

  private buildContext(
    attempt: number,
    startedAt: number,
    signal?: AbortSignal,
  ): AttemptContext {
    return {
      attempt,
      startedAt,
      elapsedMs: this.deps.clock.nowMs() - startedAt,
      ...(signal && { signal }),
    }
  }

  private buildInfo(ctx: AttemptContext, nextDelayMs: number | null): RetryAttemptInfo {
    return { ...ctx, nextDelayMs }
  }
}
