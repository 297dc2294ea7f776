function getCause(v: unknown): unknown {
  return typeof v === "object" && v !== null && "cause" in v ? v.cause : undefined
}

/**
 * Walk the error cause chain and return every value encountered,
 * outermost first. Stops on cycles and after `maxDepth` links.
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)

    const next = getCause(current)

    if (next === undefined) break
    current = next
  }

  return chain
}

/** First link of the cause chain that satisfies `predicate`. */
export function findInChain<T>(
  err: unknown,
  predicate: (link: unknown) => link is T,
): T | undefined {
  for (const link of errorChain(err)) {
    if (predicate(link)) return link
  }

  return undefined
}
