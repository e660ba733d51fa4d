import {InterfaceSpecSchema, type InterfaceSpec} from '@prefab-gateway/schemas'
import {createNoopLogger, type StructuredLogger} from '@prefab-gateway/logging'

import type {SpecCache, SpecCacheRedisClient} from './contracts'

type MemoryEntry = {
  spec: InterfaceSpec
  expiresAtMs: number | null
}

export const createInMemorySpecCache = ({now = () => Date.now()}: {now?: () => number} = {}): SpecCache => {
  const entries = new Map<string, MemoryEntry>()

  return {
    get: key => {
      const entry = entries.get(key)
      if (!entry) {
        return Promise.resolve(null)
      }

      if (entry.expiresAtMs !== null && entry.expiresAtMs <= now()) {
        entries.delete(key)
        return Promise.resolve(null)
      }

      return Promise.resolve(structuredClone(entry.spec))
    },
    set: (key, spec, ttlSeconds) => {
      entries.set(key, {
        spec: structuredClone(spec),
        expiresAtMs: ttlSeconds === undefined ? null : now() + ttlSeconds * 1000
      })
      return Promise.resolve()
    },
    delete: key => {
      entries.delete(key)
      return Promise.resolve()
    }
  }
}

export const createRedisSpecCache = ({
  client,
  keyPrefix,
  logger = createNoopLogger()
}: {
  client: SpecCacheRedisClient
  keyPrefix: string
  logger?: StructuredLogger
}): SpecCache => {
  const redisKey = (key: string) => `${keyPrefix}:${key}`

  return {
    get: async key => {
      const raw = await client.get(redisKey(key))
      if (raw === null) {
        return null
      }

      let decoded: unknown
      try {
        decoded = JSON.parse(raw)
      } catch {
        decoded = undefined
      }

      const parsed = InterfaceSpecSchema.safeParse(decoded)
      if (!parsed.success) {
        // stale or foreign payload; dropping it lets the next read go to the source
        logger.warn({
          event: 'spec.cache.corrupt',
          component: 'spec_store.redis',
          message: 'Discarding unparseable cached interface spec',
          reason_code: 'spec_cache_corrupt',
          metadata: {key}
        })
        await client.del(redisKey(key))
        return null
      }

      return parsed.data
    },
    set: async (key, spec, ttlSeconds) => {
      await client.set(redisKey(key), JSON.stringify(spec), ttlSeconds === undefined ? undefined : {EX: ttlSeconds})
    },
    delete: async key => {
      await client.del(redisKey(key))
    }
  }
}
