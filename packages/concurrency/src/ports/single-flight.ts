export type InFlightKey = string

export interface FlightResult<T> {
  value: T

  /** Whether this caller executed the function */
  isLeader: boolean

  /** Number of other callers that shared this result (excluding leader) */
  sharedWith: number
}

/**
 * Deduplicates concurrent work per key.
 *
 * Calls to `run()` with a key that is already in flight share its promise
 * and its outcome, errors included. Nothing is remembered once the flight
 * settles, so the next call after a failure starts fresh.
 */
export interface Singleflight<T> {
  run(key: InFlightKey, fn: () => Promise<T>): Promise<FlightResult<T>>

  /** Keys currently in flight. */
  readonly size: number
}
