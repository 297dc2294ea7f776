import { ValidationError } from "@mpusweep/errors"
import { z } from "zod/mini"
import type { RegionName, UploadRecord } from "../../model/upload-record"
import type { CostBreakdown, CostEstimator, CostLine } from "../../ports/collaborators"
import bundledPricing from "./pricing.json"

const GIB = 1024 ** 3

/** Last resort when neither the region nor the default table knows a class. */
export const FALLBACK_PRICE_PER_GB_MONTH = 0.023

const priceTable = z.record(z.string(), z.number().check(z.nonnegative()))

export const pricingSchema = z.object({
  currency: z.literal("USD"),
  unit: z.literal("GB-month"),
  default: priceTable,
  regions: z.record(z.string(), priceTable),
})

export type PricingTable = z.infer<typeof pricingSchema>

export function parsePricing(input: unknown): PricingTable {
  const result = pricingSchema.safeParse(input)

  if (!result.success) {
    throw new ValidationError(`invalid pricing table:\n${z.prettifyError(result.error)}`)
  }

  return result.data
}

/** `standard-ia` → `STANDARD_IA` */
export function normalizeStorageClass(storageClass: string): string {
  return storageClass.trim().toUpperCase().replaceAll("-", "_")
}

export type StaticCostEstimatorOptions = {
  /** Replaces the bundled table. Validated on construction. */
  pricing?: unknown
}

/** Storage cost from a static per-region price list, in USD per GB-month. */
export class StaticCostEstimator implements CostEstimator {
  private readonly pricing: PricingTable

  constructor(opts: StaticCostEstimatorOptions = {}) {
    this.pricing = parsePricing(opts.pricing ?? bundledPricing)
  }

  priceFor(region: RegionName, storageClass: string): number {
    const cls = normalizeStorageClass(storageClass)

    return (
      this.pricing.regions[region]?.[cls] ??
      this.pricing.default[cls] ??
      this.pricing.default.STANDARD ??
      FALLBACK_PRICE_PER_GB_MONTH
    )
  }

  async estimateMonthlyCost(records: readonly UploadRecord[]): Promise<CostBreakdown> {
    const breakdown: CostBreakdown = {
      totalMonthlyCost: 0,
      byRegion: {},
      byStorageClass: {},
      lines: [],
      currency: this.pricing.currency,
    }

    for (const record of records) {
      const line: CostLine = {
        record,
        pricePerGbMonth: this.priceFor(record.region, record.storageClass),
        monthlyCost: 0,
      }
      line.monthlyCost = (record.size / GIB) * line.pricePerGbMonth

      const cls = normalizeStorageClass(record.storageClass)

      breakdown.lines.push(line)
      breakdown.totalMonthlyCost += line.monthlyCost
      breakdown.byRegion[record.region] = (breakdown.byRegion[record.region] ?? 0) + line.monthlyCost
      breakdown.byStorageClass[cls] = (breakdown.byStorageClass[cls] ?? 0) + line.monthlyCost
    }

    return breakdown
  }

  async estimateSavings(records: readonly UploadRecord[]): Promise<number> {
    const { totalMonthlyCost } = await this.estimateMonthlyCost(records)

    return totalMonthlyCost
  }
}
