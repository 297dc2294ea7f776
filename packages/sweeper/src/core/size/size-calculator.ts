import {
  DEFAULT_CONCURRENCY,
  partitionSettled,
  runBounded,
  validateConcurrency,
} from "@mpusweep/concurrency"
import type { Logger } from "@mpusweep/logger"
import { type Bytes, type UploadRecord, validateUploadRecord } from "../../model/upload-record"
import type { SizedBatch } from "../../ports/scope"
import type { SizeCalculator } from "../../ports/services"
import type { RegionalClientRegistry } from "../region/regional-client-registry"

export type PartSizeCalculatorDeps = {
  clients: RegionalClientRegistry
  logger: Logger
}

export type PartSizeCalculatorOptions = {
  concurrency?: number
}

/** Size of an upload is the sum of its uploaded parts. */
export class PartSizeCalculator implements SizeCalculator {
  private readonly concurrency: number
  private readonly logger: Logger

  constructor(
    private readonly deps: PartSizeCalculatorDeps,
    opts: PartSizeCalculatorOptions = {},
  ) {
    this.concurrency = validateConcurrency(opts.concurrency ?? DEFAULT_CONCURRENCY)
    this.logger = deps.logger.child({ component: "size-calculator" })
  }

  async sizeOf(record: UploadRecord, signal?: AbortSignal): Promise<Bytes> {
    validateUploadRecord(record)

    const client = await this.deps.clients.clientFor(record.region)

    let total: Bytes = 0
    let partNumberMarker: string | undefined

    for (;;) {
      const page = await client.listUploadParts(
        {
          bucket: record.bucket,
          key: record.key,
          uploadId: record.uploadId,
          ...(partNumberMarker !== undefined && { partNumberMarker }),
        },
        signal,
      )

      for (const part of page.parts) total += part.size ?? 0

      if (!page.isTruncated || page.nextPartNumberMarker === undefined) break
      partNumberMarker = page.nextPartNumberMarker
    }

    return total
  }

  async sizeAll(records: readonly UploadRecord[], signal?: AbortSignal): Promise<SizedBatch> {
    const settled = await runBounded(records, (record, s) => this.sizeOf(record, s), {
      concurrency: this.concurrency,
      ...(signal && { signal }),
    })
    const { fulfilled, rejected } = partitionSettled(settled)

    for (const { item, value } of fulfilled) item.size = value

    const inaccessibleBuckets = [...new Set(rejected.map((r) => r.item.bucket))]

    for (const { item, error } of rejected) {
      this.logger.debug("upload size unavailable", {
        bucket: item.bucket,
        key: item.key,
        uploadId: item.uploadId,
        err: error,
      })
    }

    return {
      uploads: fulfilled.sort((a, b) => a.index - b.index).map((r) => r.item),
      inaccessibleBuckets,
    }
  }
}
