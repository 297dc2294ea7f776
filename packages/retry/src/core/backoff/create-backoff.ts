import { ValidationError } from "@mpusweep/errors"
import type { Delay, DelayPolicy } from "../../ports/delay-policy"
import { exponential } from "./exponential"

export type CreateBackoffOptions = {
  delay: DelayPolicy

  /** Floor. Default: 0 */
  min?: Delay

  /** Ceiling. Must be >= min. */
  max: Delay
}

function checkBound(name: string, delay: Delay): number {
  const ms = delay.milliseconds

  if (!Number.isFinite(ms) || ms < 0) {
    throw ValidationError.field(name, "must be a finite number >= 0", ms)
  }

  return ms
}

/**
 * Wraps a policy so every delay is finite, whole and within `[min, max]`.
 * Non-finite raw delays (overflowing exponentials) collapse to `max`.
 */
export function createBackoff(options: CreateBackoffOptions): DelayPolicy {
  const minMs = checkBound("backoff.min", options.min ?? { milliseconds: 0 })
  const maxMs = checkBound("backoff.max", options.max)

  if (maxMs < minMs) {
    throw ValidationError.field("backoff.max", `must be >= backoff.min (${minMs})`, maxMs)
  }

  return {
    getDelay(attempt: number): Delay {
      const raw = options.delay.getDelay(attempt).milliseconds
      const bounded = Number.isNaN(raw) ? minMs : Math.min(maxMs, Math.max(minMs, raw))

      return { milliseconds: Math.floor(bounded) }
    },
  }
}

export type ExponentialBackoffOptions = {
  baseMs: number
  factor: number
  maxDelayMs: number
}

/** `min(base * factor^attempt, maxDelay)`. */
export function exponentialBackoff(opts: ExponentialBackoffOptions): DelayPolicy {
  if (!Number.isFinite(opts.factor) || opts.factor < 1) {
    throw ValidationError.field("backoff.factor", "must be a finite number >= 1", opts.factor)
  }

  const base = { milliseconds: checkBound("backoff.base", { milliseconds: opts.baseMs }) }

  return createBackoff({
    delay: exponential({ base, factor: opts.factor }),
    max: { milliseconds: opts.maxDelayMs },
  })
}
