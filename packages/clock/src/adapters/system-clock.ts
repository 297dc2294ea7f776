import { setTimeout as delay } from "node:timers/promises"
import { createAbortError, isAbortError } from "../core/abort"
import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): UnixMs {
    return Date.now()
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw createAbortError()
    if (ms <= 0) return

    try {
      await delay(ms, undefined, signal ? { signal } : {})
    } catch (error) {
      if (isAbortError(error)) throw createAbortError()
      throw error
    }
  }
}
