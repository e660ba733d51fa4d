import {createNoopLogger, type StructuredLogger} from '@prefab-gateway/logging'
import {InterfaceSpecSchema, type InterfaceSpec} from '@prefab-gateway/schemas'

import {specCacheKey, type InterfaceSpecSource, type SpecCache, type SpecCoordinates} from './contracts'

export type InterfaceSpecStoreOptions = {
  cache: SpecCache
  source?: InterfaceSpecSource
  ttlSeconds: number
  logger?: StructuredLogger
}

/**
 * Read-through cache over the contract store. Specs published directly are
 * cached without expiry; specs read from the source expire after ttlSeconds.
 */
export class InterfaceSpecStore {
  private readonly cache: SpecCache
  private readonly source: InterfaceSpecSource | undefined
  private readonly ttlSeconds: number
  private readonly logger: StructuredLogger

  public constructor({cache, source, ttlSeconds, logger}: InterfaceSpecStoreOptions) {
    this.cache = cache
    this.source = source
    this.ttlSeconds = ttlSeconds
    this.logger = logger ?? createNoopLogger()
  }

  public async get(coordinates: SpecCoordinates): Promise<InterfaceSpec | null> {
    const key = specCacheKey(coordinates)
    const cached = await this.cache.get(key)
    if (cached) {
      this.logger.debug({
        event: 'spec.cache.hit',
        component: 'spec_store',
        service_id: coordinates.serviceId,
        metadata: {version: coordinates.version}
      })
      return cached
    }

    if (!this.source) {
      return null
    }

    const fetched = await this.source.fetch(coordinates)
    this.logger.info({
      event: fetched ? 'spec.source.loaded' : 'spec.source.missing',
      component: 'spec_store',
      service_id: coordinates.serviceId,
      metadata: {version: coordinates.version}
    })
    if (fetched) {
      await this.cache.set(key, fetched, this.ttlSeconds)
    }

    return fetched
  }

  public async publish(spec: InterfaceSpec): Promise<InterfaceSpec> {
    const parsed = InterfaceSpecSchema.parse(spec)
    await this.cache.set(specCacheKey({serviceId: parsed.service_id, version: parsed.version}), parsed)
    return parsed
  }

  /**
   * Drops a cached copy so the next read goes to the source. Without a source
   * the cache holds the only copy of published specs, so nothing is dropped.
   */
  public async invalidate(coordinates: SpecCoordinates): Promise<boolean> {
    if (!this.source) {
      return false
    }

    await this.cache.delete(specCacheKey(coordinates))
    return true
  }
}
