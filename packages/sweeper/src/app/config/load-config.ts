import { ValidationError } from "@mpusweep/errors"
import { z } from "zod/mini"
import { type EnvConfig, envSchema } from "./schema"
import { type ConfigSource, EnvSource } from "./sources"

export class Config {
  constructor(
    private readonly data: Readonly<EnvConfig>,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly mergedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): Readonly<EnvConfig> {
    return this.data
  }

  /** Which source supplied `key`, or `default` when the schema did. */
  explain(key: keyof EnvConfig): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance))]
  }

  /** Keys some source provided that the schema does not know; usually typos. */
  unknownKeys(): string[] {
    const known = new Set(Object.keys(envSchema.shape))

    return [...this.mergedKeys].filter((key) => !known.has(key))
  }
}

export async function loadConfig(
  sources: readonly ConfigSource[] = [new EnvSource()],
): Promise<Config> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = envSchema.safeParse(merged)

  if (!result.success) {
    throw new ValidationError(
      `configuration validation failed:\n${z.prettifyError(result.error)}`,
      { issues: result.error.issues.length },
    )
  }

  return new Config(result.data, provenance, new Set(Object.keys(merged)))
}
