export const comparisonOperators = [">=", "<=", "!=", ">", "<", "="] as const

export type ComparisonOperator = (typeof comparisonOperators)[number]

export type EqualityOperator = Extract<ComparisonOperator, "=" | "!=">

export type NumericPredicate = {
  op: ComparisonOperator
  raw: string

  /** Milliseconds for age, bytes for size. */
  value: number
}

export type StringPredicate = {
  op: EqualityOperator
  raw: string
}

export const filterFields = ["age", "size", "storageClass", "region", "bucket"] as const

export type FilterField = (typeof filterFields)[number]

/**
 * Conjunction of at most one predicate per field. An empty filter matches
 * every record.
 */
export type Filter = {
  age?: NumericPredicate
  size?: NumericPredicate
  storageClass?: StringPredicate
  region?: StringPredicate
  bucket?: StringPredicate
}
