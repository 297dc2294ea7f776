import type { Milliseconds } from "@mpusweep/clock"
import { ValidationError } from "@mpusweep/errors"

export const HOUR_MS: Milliseconds = 60 * 60 * 1000
export const DAY_MS: Milliseconds = 24 * HOUR_MS

/** Month and year are fixed 30- and 365-day spans, not calendar-aware. */
const ageUnits: Record<string, Milliseconds> = {
  d: DAY_MS,
  w: 7 * DAY_MS,
  m: 30 * DAY_MS,
  y: 365 * DAY_MS,
}

const NUMBER = /^-?\d+(?:\.\d+)?$/

/** Parses `7d`, `2w`, `1.5m`, `1Y` into milliseconds. */
export function parseAge(input: string): Milliseconds {
  const value = input.trim()

  if (value.length < 2) {
    throw ValidationError.field("age", "must be a number followed by d, w, m or y", input)
  }

  const unitMs = ageUnits[value.slice(-1).toLowerCase()]
  const amount = value.slice(0, -1)

  if (unitMs === undefined) {
    throw ValidationError.field("age", "unit must be one of d, w, m, y", input)
  }

  if (!NUMBER.test(amount)) {
    throw ValidationError.field("age", "must start with a number", input)
  }

  const parsed = Number.parseFloat(amount)
  if (parsed < 0) throw ValidationError.field("age", "cannot be negative", input)

  return Math.round(parsed * unitMs)
}

/** Largest unit that divides evenly (`10d`, `1w`, `2m`), or hours below a day. */
export function formatAge(ms: Milliseconds): string {
  const units: Array<[string, Milliseconds]> = [
    ["y", 365 * DAY_MS],
    ["m", 30 * DAY_MS],
    ["w", 7 * DAY_MS],
    ["d", DAY_MS],
  ]

  for (const [suffix, size] of units) {
    if (ms >= size && ms % size === 0) return `${ms / size}${suffix}`
  }

  if (ms >= DAY_MS) return `${Math.floor(ms / DAY_MS)}d`

  return `${Math.floor(ms / HOUR_MS)}h`
}
