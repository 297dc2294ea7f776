import { KeyedOnce } from "@mpusweep/concurrency"
import { ValidationError } from "@mpusweep/errors"
import type { Logger } from "@mpusweep/logger"
import type { RegionName } from "../../model/upload-record"
import type { MultipartStorageApi, StorageApiFactory } from "../../ports/storage-api"

export type RegionalClientRegistryDeps = {
  factory: StorageApiFactory
  logger: Logger
}

/**
 * One client per region, built on first use. A failed build is reported to
 * the caller and retried by the next one.
 */
export class RegionalClientRegistry {
  private readonly clients = new KeyedOnce<MultipartStorageApi>()
  private readonly logger: Logger

  constructor(private readonly deps: RegionalClientRegistryDeps) {
    this.logger = deps.logger.child({ component: "client-registry" })
  }

  clientFor(region: RegionName): Promise<MultipartStorageApi> {
    if (!region) {
      return Promise.reject(ValidationError.field("region", "must not be empty"))
    }

    return this.clients.get(region, async (key) => {
      const client = await this.deps.factory(key)
      this.logger.debug("regional client created", { region: key })

      return client
    })
  }

  regions(): RegionName[] {
    return this.clients.keys()
  }

  get size(): number {
    return this.clients.size
  }
}
