import { ValidationError } from "@mpusweep/errors"
import { loadConfig } from "../load-config"
import { loadSweeperConfig } from "../load-sweeper-config"
import { EnvSource, ObjectSource } from "../sources"

describe("loadSweeperConfig", () => {
  it("fills every setting from defaults", async () => {
    await expect(loadSweeperConfig({})).resolves.toEqual({
      aws: { region: "us-east-1" },
      sweep: {
        concurrency: 10,
        rateLimitPerSecond: 10,
        regionCacheTtlMs: 3_600_000,
        progressIntervalMs: 1000,
        maxReportedErrors: 10,
      },
      retry: { maxRetries: 3, baseDelayMs: 100, factor: 2, maxDelayMs: 30_000 },
      logging: { level: "info", prettify: false, serviceName: "mpusweep" },
    })
  })

  it("coerces environment strings", async () => {
    const config = await loadSweeperConfig({
      AWS_REGION: "eu-west-2",
      AWS_PROFILE: "sandbox",
      SWEEP_CONCURRENCY: "4",
      SWEEP_RATE_LIMIT_RPS: "2.5",
      LOG_LEVEL: "debug",
      LOG_PRETTY: "true",
    })

    expect(config.aws).toEqual({ region: "eu-west-2", profile: "sandbox" })
    expect(config.sweep.concurrency).toBe(4)
    expect(config.sweep.rateLimitPerSecond).toBe(2.5)
    expect(config.logging).toMatchObject({ level: "debug", prettify: true })
  })

  it("lets overrides win over the environment", async () => {
    const config = await loadSweeperConfig({ SWEEP_CONCURRENCY: "4" }, { SWEEP_CONCURRENCY: 8 })

    expect(config.sweep.concurrency).toBe(8)
  })

  it.each([
    ["SWEEP_CONCURRENCY", "0"],
    ["SWEEP_CONCURRENCY", "2.5"],
    ["SWEEP_RATE_LIMIT_RPS", "0"],
    ["SWEEP_RETRY_FACTOR", "0.5"],
    ["LOG_LEVEL", "verbose"],
    ["LOG_PRETTY", "maybe"],
  ])("rejects %s=%s", async (key, value) => {
    const error = await loadSweeperConfig({ [key]: value }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ValidationError)
    expect(error).toMatchObject({ message: expect.stringMatching(/^configuration validation failed:\n/) })
  })
})

describe("loadConfig", () => {
  it("records where each value came from", async () => {
    const config = await loadConfig([
      new EnvSource({ env: { AWS_REGION: "eu-west-2", SWEEP_CONCURRENCY: "2" } }),
      new ObjectSource({ SWEEP_CONCURRENCY: 3 }),
    ])

    expect(config.value.SWEEP_CONCURRENCY).toBe(3)
    expect(config.explain("AWS_REGION")).toBe("env")
    expect(config.explain("SWEEP_CONCURRENCY")).toBe("object:overrides")
    expect(config.explain("LOG_LEVEL")).toBe("default")
    expect(config.sourcesUsed()).toEqual(["env", "object:overrides"])
  })

  it("skips undefined values", async () => {
    const config = await loadConfig([
      new ObjectSource({ AWS_REGION: "eu-west-2" }, "first"),
      new ObjectSource({ AWS_REGION: undefined }, "second"),
    ])

    expect(config.value.AWS_REGION).toBe("eu-west-2")
    expect(config.explain("AWS_REGION")).toBe("first")
  })

  it("reports keys the schema does not know", async () => {
    const config = await loadConfig([new ObjectSource({ SWEEP_CONCURENCY: "4", LOG_LEVEL: "warn" })])

    expect(config.unknownKeys()).toEqual(["SWEEP_CONCURENCY"])
    expect(config.value).not.toHaveProperty("SWEEP_CONCURENCY")
  })

  it("freezes the parsed values", async () => {
    const config = await loadConfig([new ObjectSource({})])

    expect(Object.isFrozen(config.value)).toBe(true)
  })
})

describe("EnvSource", () => {
  it("reads only prefixed keys and strips the prefix", async () => {
    const source = new EnvSource({ prefix: "MPU_", env: { MPU_AWS_REGION: "eu-west-2", HOME: "/home/test" } })

    await expect(source.load()).resolves.toEqual({ AWS_REGION: "eu-west-2" })
  })
})
