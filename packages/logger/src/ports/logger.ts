import type { LogContext, LogMeta } from "./log-context"

export interface Logger {
  trace(message: string, meta?: LogMeta): void
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void
  fatal(message: string, meta?: LogMeta): void

  /**
   * Logger that adds `context` to every entry. Child fields override the
   * parent's on conflict; the parent is not changed.
   */
  child(context: Partial<LogContext>): Logger
}
