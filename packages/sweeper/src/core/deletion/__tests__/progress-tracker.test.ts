import { FakeClock } from "@mpusweep/clock"
import { NOW, uploadRecord } from "../../../tests/records"
import { ProgressTracker } from "../progress-tracker"

describe("ProgressTracker", () => {
  it("counts outcomes and the bytes they freed", () => {
    const clock = new FakeClock(NOW)
    const tracker = new ProgressTracker(clock, { total: 3, maxReportedErrors: 10 })
    const a = uploadRecord({ bucket: "logs", size: 100 })
    const b = uploadRecord({ bucket: "media", size: 50 })

    tracker.started(a)
    tracker.succeededWith(a)
    tracker.started(b)
    tracker.failedWith(b, new Error("Access Denied"))
    clock.advance(1500)

    expect(tracker.snapshot()).toEqual({
      total: 3,
      processed: 2,
      succeeded: 1,
      failed: 1,
      currentBucket: "media",
      startedAt: new Date(NOW),
      elapsedMs: 1500,
    })
    expect(tracker.result()).toMatchObject({
      totalProcessed: 2,
      succeeded: 1,
      failed: 1,
      bytesFreed: 100,
      durationMs: 1500,
      errors: [{ bucket: "media", key: b.key, uploadId: b.uploadId, message: "Access Denied" }],
    })
  })

  it("keeps only the first failures verbatim", () => {
    const tracker = new ProgressTracker(new FakeClock(NOW), { total: 3, maxReportedErrors: 2 })

    for (const message of ["first", "second", "third"]) {
      tracker.failedWith(uploadRecord(), new Error(message))
    }

    const result = tracker.result()

    expect(result.failed).toBe(3)
    expect(result.errors.map((e) => e.message)).toEqual(["first", "second"])
  })

  it("leaves out the current bucket before any work starts", () => {
    const snapshot = new ProgressTracker(new FakeClock(NOW), { total: 0, maxReportedErrors: 1 }).snapshot()

    expect(snapshot).not.toHaveProperty("currentBucket")
  })
})
