import { ValidationError } from "@mpusweep/errors"
import { MB, NOW, uploadRecord } from "../../../tests/records"
import { DAY_MS } from "../../units/age"
import { describeSelector, selectForDeletion, validateSelector } from "../delete-selector"

describe("validateSelector", () => {
  it("rejects an inverted size band", () => {
    expect(() => validateSelector({ smallerThan: 50 * MB, largerThan: 100 * MB })).toThrow(
      "smallerThan must be greater than largerThan (100.0 MB)",
    )
  })

  it("rejects an empty band", () => {
    expect(() => validateSelector({ smallerThan: MB, largerThan: MB })).toThrow(ValidationError)
  })

  it("rejects negative thresholds", () => {
    expect(() => validateSelector({ olderThanMs: -1 })).toThrow("olderThanMs must be a non-negative number")
    expect(() => validateSelector({ largerThan: -5 })).toThrow(ValidationError)
  })

  it("rejects an empty bucket name", () => {
    expect(() => validateSelector({ bucket: "" })).toThrow("bucket must not be empty")
  })

  it("accepts a proper band and an empty selector", () => {
    expect(() => validateSelector({ smallerThan: 100 * MB, largerThan: 50 * MB })).not.toThrow()
    expect(() => validateSelector({})).not.toThrow()
  })
})

describe("selectForDeletion", () => {
  const fresh = uploadRecord({ bucket: "logs", size: 10 * MB, initiated: new Date(NOW - DAY_MS) })
  const stale = uploadRecord({ bucket: "logs", size: 80 * MB, initiated: new Date(NOW - 30 * DAY_MS) })
  const huge = uploadRecord({ bucket: "media", size: 500 * MB, initiated: new Date(NOW - 30 * DAY_MS) })
  const records = [fresh, stale, huge]

  it("keeps everything for an empty selector", () => {
    expect(selectForDeletion(records, {}, NOW)).toEqual(records)
  })

  it("filters by bucket", () => {
    expect(selectForDeletion(records, { bucket: "media" }, NOW)).toEqual([huge])
  })

  it("filters by minimum age, inclusive", () => {
    expect(selectForDeletion(records, { olderThanMs: 30 * DAY_MS }, NOW)).toEqual([stale, huge])
  })

  it("filters by a size band with strict bounds", () => {
    expect(selectForDeletion(records, { largerThan: 10 * MB, smallerThan: 500 * MB }, NOW)).toEqual([stale])
  })
})

describe("describeSelector", () => {
  it("lists the criteria that are set", () => {
    expect(describeSelector({ bucket: "logs", olderThanMs: 7 * DAY_MS, smallerThan: 50 * MB, force: true })).toBe(
      "bucket=logs, older than 1w, smaller than 50.0 MB",
    )
    expect(describeSelector({ largerThan: 1024 })).toBe("larger than 1.0 KB")
  })

  it("says none when nothing is set", () => {
    expect(describeSelector({ dryRun: true })).toBe("none")
  })
})
