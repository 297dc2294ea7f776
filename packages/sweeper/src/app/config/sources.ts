/**
 * Raw configuration values. Sources only load; coercion and validation
 * happen once all of them are merged, later sources winning.
 */
export interface ConfigSource {
  /** Provenance label reported by `Config.explain`. */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}

export type EnvSourceOptions = {
  /** Only keys with this prefix are read, and the prefix is stripped. */
  prefix?: string
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string | undefined
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    if (!this.prefix) return { ...this.env }

    const filtered: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix)) filtered[key.slice(this.prefix.length)] = value
    }

    return filtered
  }
}

export class ObjectSource implements ConfigSource {
  constructor(
    private readonly values: Record<string, unknown>,
    readonly name: string = "object:overrides",
  ) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
