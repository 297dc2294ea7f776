export function createAbortError(message = "The operation was aborted"): DOMException {
  return new DOMException(message, "AbortError")
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError"
}

/**
 * Settles with `work`, or rejects with an AbortError as soon as `signal` fires,
 * whichever comes first. The work itself keeps running; only the wait ends.
 */
export async function raceAbort<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return work
  if (signal.aborted) throw createAbortError()

  let onAbort: (() => void) | undefined

  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(createAbortError())
    signal.addEventListener("abort", onAbort, { once: true })
  })

  try {
    return await Promise.race([work, aborted])
  } finally {
    if (onAbort) signal.removeEventListener("abort", onAbort)
  }
}
