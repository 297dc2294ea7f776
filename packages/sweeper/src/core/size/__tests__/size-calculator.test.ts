import { ValidationError } from "@mpusweep/errors"
import { createNullLogger } from "@mpusweep/logger"
import { FakeStorageApi } from "../../../tests/fake-storage-api"
import { MB, uploadRecord } from "../../../tests/records"
import { RegionalClientRegistry } from "../../region/regional-client-registry"
import { PartSizeCalculator } from "../size-calculator"

describe("PartSizeCalculator", () => {
  let api: FakeStorageApi
  let calculator: PartSizeCalculator

  beforeEach(() => {
    api = new FakeStorageApi([
      {
        name: "logs",
        parts: {
          "up-1": [{ partNumber: 1, size: 5 * MB }, { partNumber: 2, size: 5 * MB }, { partNumber: 3, size: 1 }],
          "up-2": [{ partNumber: 1, size: 100 }, { partNumber: 2 }],
          "up-3": [],
        },
      },
      { name: "media", parts: {} },
    ])
    const logger = createNullLogger()
    const clients = new RegionalClientRegistry({ factory: () => api, logger })
    calculator = new PartSizeCalculator({ clients, logger }, { concurrency: 2 })
  })

  it("sums parts across every page", async () => {
    const size = await calculator.sizeOf(uploadRecord({ bucket: "logs", uploadId: "up-1" }))

    expect(size).toBe(10 * MB + 1)
    expect(api.callsTo("listUploadParts")).toHaveLength(2)
  })

  it("counts parts without a size as empty", async () => {
    await expect(calculator.sizeOf(uploadRecord({ bucket: "logs", uploadId: "up-2" }))).resolves.toBe(100)
  })

  it("sizes an upload with no parts as zero", async () => {
    await expect(calculator.sizeOf(uploadRecord({ bucket: "logs", uploadId: "up-3" }))).resolves.toBe(0)
  })

  it("validates the record before calling the provider", async () => {
    await expect(calculator.sizeOf(uploadRecord({ uploadId: "" }))).rejects.toBeInstanceOf(ValidationError)
    expect(api.calls).toEqual([])
  })

  it("sizes a batch in place, dropping records that fail", async () => {
    const first = uploadRecord({ bucket: "logs", uploadId: "up-1" })
    const lost = uploadRecord({ bucket: "media", uploadId: "gone-1" })
    const second = uploadRecord({ bucket: "logs", uploadId: "up-2" })
    const alsoLost = uploadRecord({ bucket: "media", uploadId: "gone-2" })

    const batch = await calculator.sizeAll([first, lost, second, alsoLost])

    expect(batch.uploads).toEqual([first, second])
    expect(first.size).toBe(10 * MB + 1)
    expect(second.size).toBe(100)
    expect(lost.size).toBe(0)
    expect(batch.inaccessibleBuckets).toEqual(["media"])
  })

  it("returns an empty batch for no records", async () => {
    await expect(calculator.sizeAll([])).resolves.toEqual({ uploads: [], inaccessibleBuckets: [] })
  })
})
