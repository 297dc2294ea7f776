import { FakeClock } from "../fake-clock"

describe("FakeClock", () => {
  it("starts at the given instant", () => {
    const clock = new FakeClock(1_000)

    expect(clock.nowMs()).toBe(1_000)
    expect(clock.now().getTime()).toBe(1_000)
  })

  it("advance and set move virtual time", () => {
    const clock = new FakeClock()

    clock.advance(250)
    expect(clock.nowMs()).toBe(250)

    clock.set(10)
    expect(clock.nowMs()).toBe(10)
  })

  it("sleep advances time and records the request", async () => {
    const clock = new FakeClock(0)

    await clock.sleep(100)
    await clock.sleep(200)

    expect(clock.nowMs()).toBe(300)
    expect(clock.sleeps).toEqual([100, 200])
  })

  it("sleep rejects on an aborted signal without advancing", async () => {
    const clock = new FakeClock(0)
    const ac = new AbortController()
    ac.abort()

    await expect(clock.sleep(100, ac.signal)).rejects.toMatchObject({ name: "AbortError" })
    expect(clock.nowMs()).toBe(0)
    expect(clock.sleeps).toEqual([])
  })
})
