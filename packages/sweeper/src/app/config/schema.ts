import type { Milliseconds } from "@mpusweep/clock"
import { MAX_CONCURRENCY, MIN_CONCURRENCY } from "@mpusweep/concurrency"
import { type LogLevelName, logLevelNames } from "@mpusweep/logger"
import { z } from "zod/mini"

const integer = z.refine<number>((value) => Number.isInteger(value), "must be an integer")

export const envSchema = z.object({
  SERVICE_NAME: z._default(z.string(), "mpusweep"),

  AWS_PROFILE: z.optional(z.string()),
  AWS_REGION: z._default(z.string().check(z.minLength(1)), "us-east-1"),

  SWEEP_CONCURRENCY: z._default(
    z.coerce.number().check(integer, z.minimum(MIN_CONCURRENCY), z.maximum(MAX_CONCURRENCY)),
    10,
  ),
  SWEEP_RATE_LIMIT_RPS: z._default(z.coerce.number().check(z.positive()), 10),

  SWEEP_RETRY_MAX_RETRIES: z._default(z.coerce.number().check(integer, z.nonnegative()), 3),
  SWEEP_RETRY_BASE_MS: z._default(z.coerce.number().check(z.nonnegative()), 100),
  SWEEP_RETRY_FACTOR: z._default(z.coerce.number().check(z.minimum(1)), 2),
  SWEEP_RETRY_MAX_DELAY_MS: z._default(z.coerce.number().check(z.nonnegative()), 30_000),

  SWEEP_REGION_CACHE_TTL_MS: z._default(z.coerce.number().check(z.positive()), 3_600_000),
  SWEEP_PROGRESS_INTERVAL_MS: z._default(z.coerce.number().check(z.positive()), 1000),
  SWEEP_MAX_REPORTED_ERRORS: z._default(z.coerce.number().check(integer, z.nonnegative()), 10),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),
})

export type EnvConfig = z.infer<typeof envSchema>

export type SweeperConfig = {
  aws: {
    region: string
    profile?: string
  }

  sweep: {
    concurrency: number
    rateLimitPerSecond: number
    regionCacheTtlMs: Milliseconds
    progressIntervalMs: Milliseconds
    maxReportedErrors: number
  }

  retry: {
    maxRetries: number
    baseDelayMs: Milliseconds
    factor: number
    maxDelayMs: Milliseconds
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }
}
