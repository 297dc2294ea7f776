import type { BucketName, Bytes, UploadRecord } from "../../model/upload-record"

export interface SizeGroup {
  count: number
  size: Bytes
}

export interface SizeReport {
  totalSize: Bytes
  totalCount: number
  byStorageClass: Record<string, SizeGroup>
  byBucket: Record<BucketName, SizeGroup>
  inaccessibleBuckets: BucketName[]
}

function addTo(groups: Record<string, SizeGroup>, key: string, size: Bytes): void {
  const group = groups[key] ?? { count: 0, size: 0 }

  group.count += 1
  group.size += size
  groups[key] = group
}

export function buildSizeReport(
  records: readonly UploadRecord[],
  inaccessibleBuckets: readonly BucketName[] = [],
): SizeReport {
  const report: SizeReport = {
    totalSize: 0,
    totalCount: records.length,
    byStorageClass: {},
    byBucket: {},
    inaccessibleBuckets: [...inaccessibleBuckets],
  }

  for (const record of records) {
    report.totalSize += record.size
    addTo(report.byStorageClass, record.storageClass, record.size)
    addTo(report.byBucket, record.bucket, record.size)
  }

  return report
}
