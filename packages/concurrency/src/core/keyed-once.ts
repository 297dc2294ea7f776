import { MemorySingleflight } from "../adapters/memory/memory-single-flight"
import type { Singleflight } from "../ports/single-flight"

type Entry<V> = { value: V }

/**
 * Resolve-or-create-once cache. The first `get()` for a key runs `create`;
 * concurrent first callers share that one construction; later callers get
 * the stored value. A failed construction is not stored.
 */
export class KeyedOnce<V> {
  private readonly entries = new Map<string, Entry<V>>()

  constructor(private readonly flights: Singleflight<V> = new MemorySingleflight<V>()) {}

  async get(key: string, create: (key: string) => V | Promise<V>): Promise<V> {
    const hit = this.entries.get(key)
    if (hit) return hit.value

    const { value } = await this.flights.run(key, async () => {
      const raced = this.entries.get(key)
      if (raced) return raced.value

      const created = await create(key)
      this.entries.set(key, { value: created })

      return created
    })

    return value
  }

  peek(key: string): V | undefined {
    return this.entries.get(key)?.value
  }

  keys(): string[] {
    return [...this.entries.keys()]
  }

  clear(): void {
    this.entries.clear()
  }

  get size(): number {
    return this.entries.size
  }
}
