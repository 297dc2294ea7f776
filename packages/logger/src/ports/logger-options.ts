import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Minimum level emitted; anything below is dropped. */
  level: LogLevelName

  /**
   * Human-readable output through pino-pretty. Keep off wherever logs are
   * collected as JSON.
   */
  prettify?: boolean
}
