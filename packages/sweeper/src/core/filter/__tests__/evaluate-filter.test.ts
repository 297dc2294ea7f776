import { MB, NOW, uploadRecord } from "../../../tests/records"
import { DAY_MS, HOUR_MS } from "../../units/age"
import { matchesFilter } from "../evaluate-filter"
import { parseFilter } from "../parse-filter"

const initiatedAgo = (ms: number) => new Date(NOW - ms)

describe("matchesFilter", () => {
  it("compares sizes exactly", () => {
    const under = parseFilter("size<100MB")

    expect(matchesFilter(uploadRecord({ size: 50 * MB }), under, NOW)).toBe(true)
    expect(matchesFilter(uploadRecord({ size: 200 * MB }), under, NOW)).toBe(false)

    const exact = parseFilter("size=104857600")

    expect(matchesFilter(uploadRecord({ size: 100 * MB }), exact, NOW)).toBe(true)
    expect(matchesFilter(uploadRecord({ size: 100 * MB + 1 }), exact, NOW)).toBe(false)
  })

  it("treats age equality as within one hour either side", () => {
    const filter = parseFilter("age=7d")

    const near = uploadRecord({ initiated: initiatedAgo(7 * DAY_MS + 59 * 60 * 1000) })
    const edge = uploadRecord({ initiated: initiatedAgo(7 * DAY_MS - HOUR_MS) })
    const outside = uploadRecord({ initiated: initiatedAgo(7 * DAY_MS + 3 * HOUR_MS) })

    expect(matchesFilter(near, filter, NOW)).toBe(true)
    expect(matchesFilter(edge, filter, NOW)).toBe(true)
    expect(matchesFilter(outside, filter, NOW)).toBe(false)
  })

  it("inverts the window for age inequality", () => {
    const filter = parseFilter("age!=7d")

    expect(matchesFilter(uploadRecord({ initiated: initiatedAgo(7 * DAY_MS) }), filter, NOW)).toBe(false)
    expect(matchesFilter(uploadRecord({ initiated: initiatedAgo(8 * DAY_MS) }), filter, NOW)).toBe(true)
  })

  it("orders ages by time since initiation", () => {
    const older = parseFilter("age>7d")

    expect(matchesFilter(uploadRecord({ initiated: initiatedAgo(8 * DAY_MS) }), older, NOW)).toBe(true)
    expect(matchesFilter(uploadRecord({ initiated: initiatedAgo(6 * DAY_MS) }), older, NOW)).toBe(false)
  })

  it("compares text fields without regard to case", () => {
    const record = uploadRecord({ bucket: "logs", region: "us-east-1", storageClass: "STANDARD" })

    expect(matchesFilter(record, parseFilter("bucket=LOGS"), NOW)).toBe(true)
    expect(matchesFilter(record, parseFilter("storageClass=standard"), NOW)).toBe(true)
    expect(matchesFilter(record, parseFilter("region!=US-EAST-1"), NOW)).toBe(false)
  })

  it("requires every predicate to hold", () => {
    const filter = parseFilter("bucket=logs,size>1MB")

    expect(matchesFilter(uploadRecord({ bucket: "logs", size: 2 * MB }), filter, NOW)).toBe(true)
    expect(matchesFilter(uploadRecord({ bucket: "logs", size: MB }), filter, NOW)).toBe(false)
    expect(matchesFilter(uploadRecord({ bucket: "media", size: 2 * MB }), filter, NOW)).toBe(false)
  })

  it("matches everything with an empty filter", () => {
    expect(matchesFilter(uploadRecord(), {}, NOW)).toBe(true)
  })
})
