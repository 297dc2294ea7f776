import { KeyedOnce } from "../keyed-once"

describe("KeyedOnce", () => {
  it("constructs once per key under concurrent first access", async () => {
    const cache = new KeyedOnce<{ region: string }>()
    const create = vi.fn(async (region: string) => {
      await new Promise((r) => setTimeout(r, 5))
      return { region }
    })

    const [a, b, c] = await Promise.all([
      cache.get("eu-west-1", create),
      cache.get("eu-west-1", create),
      cache.get("eu-west-1", create),
    ])

    expect(create).toHaveBeenCalledTimes(1)
    expect(a).toBe(b)
    expect(b).toBe(c)
  })

  it("keeps separate entries per key", async () => {
    const cache = new KeyedOnce<string>()

    await cache.get("us-east-1", (k) => `client:${k}`)
    await cache.get("ap-south-1", (k) => `client:${k}`)

    expect(cache.size).toBe(2)
    expect(cache.keys().sort()).toEqual(["ap-south-1", "us-east-1"])
    expect(cache.peek("ap-south-1")).toBe("client:ap-south-1")
  })

  it("returns the stored value without calling create again", async () => {
    const cache = new KeyedOnce<number>()
    const create = vi.fn(() => 1)

    await cache.get("k", create)
    await cache.get("k", create)

    expect(create).toHaveBeenCalledTimes(1)
  })

  it("does not store failed constructions", async () => {
    const cache = new KeyedOnce<string>()
    const create = vi
      .fn<(key: string) => Promise<string>>()
      .mockRejectedValueOnce(new Error("endpoint unavailable"))
      .mockResolvedValueOnce("ok")

    await expect(cache.get("me-south-1", create)).rejects.toThrow("endpoint unavailable")
    expect(cache.peek("me-south-1")).toBeUndefined()

    await expect(cache.get("me-south-1", create)).resolves.toBe("ok")
    expect(create).toHaveBeenCalledTimes(2)
  })

  it("clear() forgets everything", async () => {
    const cache = new KeyedOnce<string>()
    await cache.get("k", () => "v")

    cache.clear()

    expect(cache.size).toBe(0)
  })
})
