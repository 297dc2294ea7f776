import type { Clock } from "@mpusweep/clock"
import type { Filter } from "../../model/filter"
import type { UploadRecord } from "../../model/upload-record"
import type { FilterEngine } from "../../ports/services"
import { matchesFilter } from "./evaluate-filter"
import { parseFilter } from "./parse-filter"

export type QueryFilterEngineDeps = {
  clock: Clock
}

export class QueryFilterEngine implements FilterEngine {
  constructor(private readonly deps: QueryFilterEngineDeps) {}

  parse(query: string): Filter {
    return parseFilter(query)
  }

  validate(query: string): void {
    parseFilter(query)
  }

  /** Records matching every predicate, in input order. Ages are taken at call time. */
  apply(records: readonly UploadRecord[], filter: Filter): UploadRecord[] {
    const now = this.deps.clock.nowMs()

    return records.filter((record) => matchesFilter(record, filter, now))
  }
}
