import { AbortedError, ValidationError } from "@mpusweep/errors"
import type { BoundedRunOptions, Settled, Worker } from "../ports/worker-pool"

export const MIN_CONCURRENCY = 1
export const MAX_CONCURRENCY = 100
export const DEFAULT_CONCURRENCY = 10

export function validateConcurrency(concurrency: number): number {
  if (
    !Number.isInteger(concurrency) ||
    concurrency < MIN_CONCURRENCY ||
    concurrency > MAX_CONCURRENCY
  ) {
    throw ValidationError.field(
      "concurrency",
      `must be an integer between ${MIN_CONCURRENCY} and ${MAX_CONCURRENCY}`,
      concurrency,
    )
  }

  return concurrency
}

/**
 * Runs `worker` over every item with at most `concurrency` units in flight
 * and resolves once all of them have settled. A failing unit never stops its
 * siblings; its error comes back in its Settled entry.
 *
 * Results arrive in completion order; `index` points back into `items`.
 * Throws AbortedError after the running units drain if `signal` fired.
 */
export async function runBounded<I, R>(
  items: readonly I[],
  worker: Worker<I, R>,
  options: BoundedRunOptions<I, R>,
): Promise<Settled<I, R>[]> {
  const concurrency = validateConcurrency(options.concurrency)
  const { signal, onSettled } = options

  if (signal?.aborted) throw AbortedError.fromSignal(signal)

  const queue = items.entries()
  const results: Settled<I, R>[] = []

  const lane = async (): Promise<void> => {
    for (;;) {
      const next = queue.next()
      if (next.done || signal?.aborted) return

      const [index, item] = next.value
      let settled: Settled<I, R>

      try {
        settled = { ok: true, item, index, value: await worker(item, signal) }
      } catch (error) {
        settled = { ok: false, item, index, error }
      }

      results.push(settled)
      onSettled?.(settled)
    }
  }

  const lanes = Math.min(concurrency, items.length)
  await Promise.all(Array.from({ length: lanes }, lane))

  if (signal?.aborted) throw AbortedError.fromSignal(signal)

  return results
}

export function partitionSettled<I, R>(results: readonly Settled<I, R>[]) {
  const fulfilled: Array<Extract<Settled<I, R>, { ok: true }>> = []
  const rejected: Array<Extract<Settled<I, R>, { ok: false }>> = []

  for (const result of results) {
    if (result.ok) fulfilled.push(result)
    else rejected.push(result)
  }

  return { fulfilled, rejected }
}
