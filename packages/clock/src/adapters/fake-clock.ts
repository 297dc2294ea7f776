import { createAbortError } from "../core/abort"
import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/**
 * Virtual clock. `sleep` advances time by the requested amount instead of
 * waiting, so backoff and rate-limit waits run instantly and stay observable
 * through `sleeps`.
 */
export class FakeClock implements Clock {
  readonly sleeps: Milliseconds[] = []
  private time: UnixMs

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: UnixMs): void {
    this.time = ms
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw createAbortError()

    this.sleeps.push(ms)
    this.advance(Math.max(0, ms))
  }
}
