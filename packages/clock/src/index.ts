export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export { createAbortError, isAbortError, raceAbort } from "./core/abort"
export type { Clock, Sleeper, TimeSource } from "./ports/clock"
export type * from "./ports/time"
