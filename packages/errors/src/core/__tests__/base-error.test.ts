import { BaseError, describeError, serializeError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2026-03-01T08:00:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("carries code, context and defaults", () => {
    const err = new BaseError("bucket listing failed", {
      code: "listing_failed",
      context: { bucket: "media-archive" },
    })

    expect(err.name).toBe("BaseError")
    expect(err.code).toBe("listing_failed")
    expect(err.context).toEqual({ bucket: "media-archive" })
    expect(err.isRetryable).toBe(false)
    expect(err.isOperational).toBe(true)
    expect(err.timestamp.toISOString()).toBe("2026-03-01T08:00:00.000Z")
    expect(Object.isFrozen(err.context)).toBe(true)
  })

  it("names subclasses after themselves", () => {
    class ThrottledError extends BaseError<"throttled"> {}

    expect(new ThrottledError("slow down", { code: "throttled" }).name).toBe("ThrottledError")
  })

  it("serializes the cause chain", () => {
    const root = new Error("socket hang up")
    const err = new BaseError("list failed", { code: "list_failed", cause: root })

    expect(err.toJSON()).toEqual({
      name: "BaseError",
      code: "list_failed",
      message: "list failed",
      context: {},
      isOperational: true,
      timestamp: "2026-03-01T08:00:00.000Z",
      cause: {
        name: "Error",
        code: "unknown",
        message: "socket hang up",
        context: {},
        isOperational: false,
        timestamp: "2026-03-01T08:00:00.000Z",
      },
    })
  })

  it("wraps non-Error values", () => {
    expect(serializeError("plain")).toMatchObject({
      name: "NonErrorThrown",
      message: "plain",
      context: { value: "plain" },
    })
  })

  it("includes the stack only on request", () => {
    const err = new Error("x")

    expect(serializeError(err).stack).toBeUndefined()
    expect(serializeError(err, { includeStack: true }).stack).toBe(err.stack)
  })

  it("describeError reads messages from any thrown value", () => {
    expect(describeError(new Error("boom"))).toBe("boom")
    expect(describeError("text")).toBe("text")
    expect(describeError(42)).toBe("42")
  })
})
