export interface RateLimiter {
  /**
   * Wait for one token. Rejects with AbortedError once `signal` fires,
   * whether queued behind other callers or waiting for a refill.
   */
  acquire(signal?: AbortSignal): Promise<void>

  /** Take a token if one is available right now. */
  tryAcquire(): boolean
}
