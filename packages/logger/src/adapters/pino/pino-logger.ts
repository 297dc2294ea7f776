import type { Writable } from "node:stream"
import pino, { type Logger as PinoBase, type LoggerOptions as PinoOptions } from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /** Existing pino instance to derive from; wins over `destination`. */
  base?: PinoBase

  /** Sink for JSON lines. Defaults to stdout. Ignored when prettifying. */
  destination?: Writable
}

export class PinoLogger implements Logger {
  private readonly logger: PinoBase

  constructor(
    deps: PinoLoggerDeps,
    private readonly opts: LoggerOptions,
    bindings: Partial<LogContext> = {},
  ) {
    this.logger = this.init(deps, bindings)
  }

  private init(deps: PinoLoggerDeps, bindings: Partial<LogContext>): PinoBase {
    if (deps.base) return deps.base.child(bindings)

    const options: PinoOptions = {
      level: this.opts.level,
      serializers: { err: errWithCause },
    }

    if (this.opts.prettify) {
      return pino({
        ...options,
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss.l", ignore: "pid,hostname" },
        },
      }).child(bindings)
    }

    const root = deps.destination ? pino(options, deps.destination) : pino(options)

    return root.child(bindings)
  }

  trace(message: string, meta: LogMeta = {}): void {
    this.logger.trace(meta, message)
  }

  debug(message: string, meta: LogMeta = {}): void {
    this.logger.debug(meta, message)
  }

  info(message: string, meta: LogMeta = {}): void {
    this.logger.info(meta, message)
  }

  warn(message: string, meta: LogMeta = {}): void {
    this.logger.warn(meta, message)
  }

  error(message: string, meta: LogMeta = {}): void {
    this.logger.error(meta, message)
  }

  fatal(message: string, meta: LogMeta = {}): void {
    this.logger.fatal(meta, message)
  }

  child(context: Partial<LogContext>): Logger {
    return new PinoLogger({ base: this.logger }, this.opts, context)
  }
}

export function createPinoLogger(
  opts: LoggerOptions & { service?: string },
  deps: PinoLoggerDeps = {},
): Logger {
  const { service, ...loggerOptions } = opts

  return new PinoLogger(deps, loggerOptions, service === undefined ? {} : { service })
}
