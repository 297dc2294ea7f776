import { loadConfig } from "./load-config"
import type { EnvConfig, SweeperConfig } from "./schema"
import { type ConfigSource, EnvSource, ObjectSource } from "./sources"

export function mapEnvToConfig(env: EnvConfig): SweeperConfig {
  return {
    aws: {
      region: env.AWS_REGION,
      ...(env.AWS_PROFILE && { profile: env.AWS_PROFILE }),
    },
    sweep: {
      concurrency: env.SWEEP_CONCURRENCY,
      rateLimitPerSecond: env.SWEEP_RATE_LIMIT_RPS,
      regionCacheTtlMs: env.SWEEP_REGION_CACHE_TTL_MS,
      progressIntervalMs: env.SWEEP_PROGRESS_INTERVAL_MS,
      maxReportedErrors: env.SWEEP_MAX_REPORTED_ERRORS,
    },
    retry: {
      maxRetries: env.SWEEP_RETRY_MAX_RETRIES,
      baseDelayMs: env.SWEEP_RETRY_BASE_MS,
      factor: env.SWEEP_RETRY_FACTOR,
      maxDelayMs: env.SWEEP_RETRY_MAX_DELAY_MS,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
  }
}

/**
 * Environment first, then `overrides` (raw env-style keys such as
 * `SWEEP_CONCURRENCY`) on top.
 */
export async function loadSweeperConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides?: Record<string, unknown>,
): Promise<SweeperConfig> {
  const sources: ConfigSource[] = [new EnvSource({ env })]
  if (overrides) sources.push(new ObjectSource(overrides))

  const config = await loadConfig(sources)

  return mapEnvToConfig(config.value)
}
