import { ValidationError } from "@mpusweep/errors"
import { formatBytes, parseSize } from "../bytes"

describe("parseSize", () => {
  it("takes a bare integer as bytes", () => {
    expect(parseSize("104857600")).toBe(104_857_600)
  })

  it("uses binary multiples", () => {
    expect(parseSize("1KB")).toBe(1024)
    expect(parseSize("100MB")).toBe(104_857_600)
    expect(parseSize("2TB")).toBe(2 * 1024 ** 4)
  })

  it("ignores case and whitespace between number and unit", () => {
    expect(parseSize("512 b")).toBe(512)
    expect(parseSize(" 1.5gb ")).toBe(1_610_612_736)
  })

  it("rounds fractional bytes down", () => {
    expect(parseSize("0.5B")).toBe(0)
    expect(parseSize("1.001KB")).toBe(1025)
  })

  it.each(["", "-5", "-1MB", "10XB", "MB", "1.2.3MB"])("rejects %j", (input) => {
    expect(() => parseSize(input)).toThrow(ValidationError)
  })

  it.each(["99999999999999999999", "99999999TB"])("rejects %j as too large", (input) => {
    expect(() => parseSize(input)).toThrow("size is too large")
  })

  it("accepts the largest exact byte count", () => {
    expect(parseSize(String(Number.MAX_SAFE_INTEGER))).toBe(Number.MAX_SAFE_INTEGER)
  })
})

describe("formatBytes", () => {
  it.each([
    [0, "0 B"],
    [512, "512 B"],
    [1536, "1.5 KB"],
    [104_857_600, "100.0 MB"],
    [1024 ** 4, "1.0 TB"],
  ])("formats %d as %s", (bytes, expected) => {
    expect(formatBytes(bytes)).toBe(expected)
  })
})
