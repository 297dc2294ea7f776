export type Settled<I, R> =
  | { ok: true; item: I; index: number; value: R }
  | { ok: false; item: I; index: number; error: unknown }

export type Worker<I, R> = (item: I, signal?: AbortSignal) => Promise<R>

export type BoundedRunOptions<I, R> = {
  /** Maximum units in flight. Integer in [1, 100]. */
  concurrency: number

  /** Once fired, no further unit starts; units already running finish. */
  signal?: AbortSignal

  /** Called as each unit settles, in completion order. */
  onSettled?: (result: Settled<I, R>) => void
}
