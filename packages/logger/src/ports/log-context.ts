/**
 * Structured fields a sweep emits. Components bind the stable ones
 * (`service`, `component`) through `child()` and pass the rest per call.
 */
export type LogContext = {
  service: string
  component: string
  operation: string

  bucket: string
  region: string
  key: string
  uploadId: string

  attempt: number
  delayMs: number
  durationMs: number

  total: number
  processed: number
  succeeded: number
  failed: number
  bytes: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta = Partial<LogContext> & Partial<LogEvent>
