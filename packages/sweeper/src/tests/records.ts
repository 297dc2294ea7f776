import type { UploadRecord } from "../model/upload-record"

export const NOW = Date.parse("2024-06-01T00:00:00.000Z")

export const MB = 1024 * 1024

let sequence = 0

export function uploadRecord(overrides: Partial<UploadRecord> = {}): UploadRecord {
  sequence++

  return {
    bucket: "logs",
    key: `path/object-${sequence}.bin`,
    uploadId: `upload-${sequence}`,
    initiated: new Date(NOW - 24 * 60 * 60 * 1000),
    storageClass: "STANDARD",
    region: "us-east-1",
    size: 0,
    ...overrides,
  }
}

export function session(key: string, uploadId = `${key}-id`, initiated = new Date(NOW)) {
  return { key, uploadId, initiated, storageClass: "STANDARD" }
}
