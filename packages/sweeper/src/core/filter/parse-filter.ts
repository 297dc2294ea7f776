import { ValidationError } from "@mpusweep/errors"
import {
  type ComparisonOperator,
  type EqualityOperator,
  type Filter,
  type FilterField,
  filterFields,
} from "../../model/filter"
import { parseAge } from "../units/age"
import { parseSize } from "../units/bytes"

const CONDITION = /^(\w+)\s*(>=|<=|!=|>|<|=)\s*(.+)$/

const fieldsByLowercase = new Map<string, FilterField>(
  filterFields.map((field) => [field.toLowerCase(), field]),
)

function isEquality(op: ComparisonOperator): op is EqualityOperator {
  return op === "=" || op === "!="
}

function isOperator(op: string): op is ComparisonOperator {
  return [">=", "<=", "!=", ">", "<", "="].includes(op)
}

/**
 * Parses `age>7d,size>=100MB,storageClass=STANDARD`.
 *
 * Conditions are comma separated and ANDed. Field names are
 * case-insensitive, each may appear once, and blank conditions are
 * ignored, so an empty query is a filter that matches everything.
 */
export function parseFilter(query: string): Filter {
  const filter: Filter = {}

  for (const part of query.split(",")) {
    const condition = part.trim()
    if (!condition) continue

    const match = CONDITION.exec(condition)
    const [, rawField, op, rawValue] = match ?? []

    if (rawField === undefined || op === undefined || rawValue === undefined || !isOperator(op)) {
      throw new ValidationError(`invalid filter condition: ${condition}`, { condition })
    }

    const field = fieldsByLowercase.get(rawField.toLowerCase())

    if (!field) {
      throw new ValidationError(
        `unsupported filter field: ${rawField} (supported: ${filterFields.join(", ")})`,
        { field: rawField },
      )
    }

    if (filter[field]) {
      throw new ValidationError(`${field} filter already specified`, { field })
    }

    const raw = rawValue.trim()

    switch (field) {
      case "age":
        filter.age = { op, raw, value: parseAge(raw) }
        break
      case "size":
        filter.size = { op, raw, value: parseSize(raw) }
        break
      case "storageClass":
      case "region":
      case "bucket":
        if (!isEquality(op)) {
          throw new ValidationError(`${field} filter only supports = and != operators`, {
            field,
            op,
          })
        }
        filter[field] = { op, raw }
        break
    }
  }

  return filter
}

/** Canonical text of a parsed filter; parses back to an equal filter. */
export function formatFilter(filter: Filter): string {
  return filterFields
    .flatMap((field) => {
      const predicate = filter[field]
      return predicate ? [`${field}${predicate.op}${predicate.raw}`] : []
    })
    .join(",")
}
