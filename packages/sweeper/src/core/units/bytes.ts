import { ValidationError } from "@mpusweep/errors"
import type { Bytes } from "../../model/upload-record"

const KIB = 1024

const sizeUnits: Record<string, number> = {
  B: 1,
  KB: KIB,
  MB: KIB ** 2,
  GB: KIB ** 3,
  TB: KIB ** 4,
}

const BARE_INTEGER = /^\d+$/
const WITH_UNIT = /^(\d+(?:\.\d+)?)\s*([A-Z]+)$/

/**
 * Parses `104857600`, `100MB`, `1.5gb`. Units are binary (1 KB = 1024 B)
 * and case-insensitive; fractional results round down to whole bytes.
 */
export function parseSize(input: string): Bytes {
  const value = input.trim().toUpperCase()

  if (value.startsWith("-")) {
    throw ValidationError.field("size", "cannot be negative", input)
  }

  if (BARE_INTEGER.test(value)) return checkSafe(Number.parseInt(value, 10), input)

  const match = WITH_UNIT.exec(value)
  const amount = match?.[1]
  const unit = match?.[2]
  const multiplier = unit === undefined ? undefined : sizeUnits[unit]

  if (amount === undefined || multiplier === undefined) {
    throw ValidationError.field("size", "must be bytes or a number with B, KB, MB, GB or TB", input)
  }

  return checkSafe(Math.floor(Number.parseFloat(amount) * multiplier), input)
}

function checkSafe(bytes: number, input: string): Bytes {
  if (!Number.isSafeInteger(bytes)) throw ValidationError.field("size", "is too large", input)

  return bytes
}

const displayUnits = ["KB", "MB", "GB", "TB", "PB"] as const

/** `0 B`, `512 B`, `1.5 KB`, `100.0 MB`. */
export function formatBytes(bytes: Bytes): string {
  if (bytes < KIB) return `${bytes} B`

  let value = bytes / KIB
  let unit = 0

  while (value >= KIB && unit < displayUnits.length - 1) {
    value /= KIB
    unit++
  }

  return `${value.toFixed(1)} ${displayUnits[unit]}`
}
