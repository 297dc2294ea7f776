import type { Milliseconds, UnixMs } from "@mpusweep/clock"

export interface AttemptContext {
  /** 0-indexed attempt number */
  attempt: number

  /** Epoch ms when the first attempt started */
  startedAt: UnixMs

  /** ms since the first attempt started */
  elapsedMs: Milliseconds

  signal?: AbortSignal
}

export interface RetryAttemptInfo extends AttemptContext {
  /** Sleep before the next attempt; null once no attempt follows. */
  nextDelayMs: Milliseconds | null
}
