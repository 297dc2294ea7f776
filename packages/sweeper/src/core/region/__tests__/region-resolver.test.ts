import { FakeClock } from "@mpusweep/clock"
import { AbortedError, ValidationError } from "@mpusweep/errors"
import { createNullLogger } from "@mpusweep/logger"
import { FakeStorageApi, providerError } from "../../../tests/fake-storage-api"
import { CachingRegionResolver, DEFAULT_REGION_CACHE_TTL_MS, normalizeLocation } from "../region-resolver"

describe("normalizeLocation", () => {
  it("maps an empty constraint to the home region", () => {
    expect(normalizeLocation(undefined)).toBe("us-east-1")
    expect(normalizeLocation("")).toBe("us-east-1")
  })

  it("maps the legacy EU alias", () => {
    expect(normalizeLocation("EU")).toBe("eu-west-1")
  })

  it("keeps real region names", () => {
    expect(normalizeLocation("ap-southeast-2")).toBe("ap-southeast-2")
  })
})

describe("CachingRegionResolver", () => {
  const HOUR = DEFAULT_REGION_CACHE_TTL_MS

  let clock: FakeClock
  let api: FakeStorageApi
  let resolver: CachingRegionResolver

  beforeEach(() => {
    clock = new FakeClock(1_000)
    api = new FakeStorageApi([
      { name: "logs", location: "eu-west-2" },
      { name: "legacy", location: "EU" },
      { name: "home" },
    ])
    resolver = new CachingRegionResolver({ api, clock, logger: createNullLogger() })
  })

  it("resolves and normalises bucket locations", async () => {
    await expect(resolver.resolve("logs")).resolves.toBe("eu-west-2")
    await expect(resolver.resolve("legacy")).resolves.toBe("eu-west-1")
    await expect(resolver.resolve("home")).resolves.toBe("us-east-1")
  })

  it("reuses an entry for an hour and refetches after", async () => {
    await resolver.resolve("logs")

    clock.advance(HOUR - 1)
    await resolver.resolve("logs")
    expect(api.callsTo("getBucketLocation")).toHaveLength(1)

    clock.advance(1)
    await resolver.resolve("logs")
    expect(api.callsTo("getBucketLocation")).toHaveLength(2)
  })

  it("shares one lookup between concurrent misses", async () => {
    const regions = await Promise.all([
      resolver.resolve("logs"),
      resolver.resolve("logs"),
      resolver.resolve("logs"),
    ])

    expect(regions).toEqual(["eu-west-2", "eu-west-2", "eu-west-2"])
    expect(api.callsTo("getBucketLocation")).toHaveLength(1)
  })

  it("cancels only the caller whose signal fired", async () => {
    const slow = new FakeStorageApi([{ name: "logs", location: "eu-west-2" }], { latencyMs: 20 })
    const local = new CachingRegionResolver({ api: slow, clock, logger: createNullLogger() })
    const controller = new AbortController()

    const first = local.resolve("logs", controller.signal)
    const second = local.resolve("logs")
    controller.abort()

    await expect(first).rejects.toBeInstanceOf(AbortedError)
    await expect(second).resolves.toBe("eu-west-2")
    expect(slow.callsTo("getBucketLocation")).toHaveLength(1)
  })

  it("fails fast on an already aborted signal", async () => {
    const controller = new AbortController()
    controller.abort()

    await expect(resolver.resolve("logs", controller.signal)).rejects.toBeInstanceOf(AbortedError)
    expect(api.calls).toEqual([])
  })

  it("does not cache failures", async () => {
    api.failOn("getBucketLocation", "logs", providerError("AccessDenied"), 1)

    await expect(resolver.resolve("logs")).rejects.toThrow("AccessDenied")
    await expect(resolver.resolve("logs")).resolves.toBe("eu-west-2")
    expect(api.callsTo("getBucketLocation")).toHaveLength(2)
  })

  it("exposes fresh entries through lookup", async () => {
    expect(resolver.lookup("logs")).toBeUndefined()

    await resolver.resolve("logs")

    expect(resolver.lookup("logs")).toEqual({ name: "logs", region: "eu-west-2", resolvedAt: 1_000 })

    clock.advance(HOUR)
    expect(resolver.lookup("logs")).toBeUndefined()
  })

  it("reports and clears the cache", async () => {
    await resolver.resolve("logs")
    await resolver.resolve("home")

    expect(resolver.stats()).toEqual({ cachedRegions: 2, ttlMs: HOUR })

    resolver.clear()

    expect(resolver.stats()).toEqual({ cachedRegions: 0, ttlMs: HOUR })
    await resolver.resolve("logs")
    expect(api.callsTo("getBucketLocation")).toHaveLength(3)
  })

  it("rejects an empty bucket name", async () => {
    await expect(resolver.resolve("")).rejects.toBeInstanceOf(ValidationError)
    expect(api.calls).toEqual([])
  })

  it("rejects a non-positive ttl", () => {
    expect(
      () => new CachingRegionResolver({ api, clock, logger: createNullLogger() }, { ttlMs: 0 }),
    ).toThrow("regionCacheTtlMs must be a finite number > 0")
  })
})
