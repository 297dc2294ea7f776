import { type Clock, createAbortError, isAbortError, raceAbort } from "@mpusweep/clock"
import { AbortedError, ValidationError } from "@mpusweep/errors"
import type { RateLimiter } from "../ports/rate-limiter"

export type TokenBucketDeps = {
  clock: Clock
}

export type TokenBucketOptions = {
  /** Tokens added per second. */
  ratePerSecond: number

  /** Bucket capacity; also the initial fill. Default: `ratePerSecond`. */
  burst?: number
}

/**
 * Token bucket on an injected clock. Waiters are served one at a time in
 * arrival order, so a burst of callers drains the bucket evenly instead of
 * all waking on the same refill.
 */
export class TokenBucket implements RateLimiter {
  private readonly rate: number
  private readonly capacity: number
  private tokens: number
  private lastRefillMs: number
  private tail: Promise<void> = Promise.resolve()

  constructor(
    private readonly deps: TokenBucketDeps,
    opts: TokenBucketOptions,
  ) {
    if (!Number.isFinite(opts.ratePerSecond) || opts.ratePerSecond <= 0) {
      throw ValidationError.field("ratePerSecond", "must be a finite number > 0", opts.ratePerSecond)
    }

    const burst = opts.burst ?? opts.ratePerSecond
    if (!Number.isFinite(burst) || burst < 1) {
      throw ValidationError.field("burst", "must be a finite number >= 1", burst)
    }

    this.rate = opts.ratePerSecond
    this.capacity = burst
    this.tokens = burst
    this.lastRefillMs = deps.clock.nowMs()
  }

  tryAcquire(): boolean {
    this.refill()

    if (this.tokens < 1) return false

    this.tokens -= 1
    return true
  }

  /** Milliseconds until one token is available. */
  waitTimeMs(): number {
    this.refill()

    if (this.tokens >= 1) return 0

    return Math.ceil(((1 - this.tokens) * 1000) / this.rate)
  }

  available(): number {
    this.refill()
    return this.tokens
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw AbortedError.fromSignal(signal, "rate limit wait")

    const turn = this.tail.then(() => this.take(signal))
    this.tail = turn.catch(() => undefined)

    try {
      await raceAbort(turn, signal)
    } catch (error) {
      if (isAbortError(error)) throw new AbortedError("rate limit wait", error)
      throw error
    }
  }

  private async take(signal?: AbortSignal): Promise<void> {
    for (;;) {
      if (signal?.aborted) throw createAbortError()
      if (this.tryAcquire()) return

      await this.deps.clock.sleep(this.waitTimeMs(), signal)
    }
  }

  private refill(): void {
    const now = this.deps.clock.nowMs()
    const elapsed = now - this.lastRefillMs

    if (elapsed <= 0) return

    this.tokens = Math.min(this.capacity, this.tokens + (elapsed * this.rate) / 1000)
    this.lastRefillMs = now
  }
}
