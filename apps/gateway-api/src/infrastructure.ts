import type {AclSetClient} from '@prefab-gateway/access-control'
import type {KeyValueClient} from '@prefab-gateway/invoker'
import type {SecretHashClient} from '@prefab-gateway/secret-vault'
import type {SpecCacheRedisClient} from '@prefab-gateway/spec-store'
import {createClient} from 'redis'

import type {ServiceConfig} from './config'

export type GatewayRedisClient = ReturnType<typeof createClient>

/** Narrow clients handed to the packages; each wraps the one shared connection. */
export type RedisClients = {
  keyPrefix: string
  secrets: SecretHashClient
  acl: AclSetClient
  specCache: SpecCacheRedisClient
  keyValue: KeyValueClient
}

export type ProcessInfrastructure = {
  enabled: boolean
  redis: RedisClients | null
  close: () => Promise<void>
}

export const toRedisClients = ({client, keyPrefix}: {client: GatewayRedisClient; keyPrefix: string}): RedisClients => ({
  keyPrefix,
  secrets: {
    hGet: async (key, field) => (await client.hGet(key, field)) ?? null,
    hSet: async (key, field, value) => {
      await client.hSet(key, field, value)
    },
    hDel: (key, field) => client.hDel(key, field),
    hGetAll: async key =>
      Object.fromEntries(Object.entries(await client.hGetAll(key)).map(([field, value]) => [field, String(value)]))
  },
  acl: {
    sAdd: (key, member) => client.sAdd(key, member),
    sIsMember: async (key, member) => Boolean(await client.sIsMember(key, member)),
    sMembers: async key => (await client.sMembers(key)).map(String)
  },
  specCache: {
    get: async key => (await client.get(key)) ?? null,
    set: async (key, value, options) => {
      if (options?.EX !== undefined) {
        await client.set(key, value, {EX: options.EX})
        return
      }
      await client.set(key, value)
    },
    del: key => client.del(key)
  },
  keyValue: {
    get: async key => (await client.get(key)) ?? null,
    set: async (key, value, options) =>
      (options?.NX ? await client.set(key, value, {NX: true}) : await client.set(key, value)) === 'OK'
  }
})

const createDisabledInfrastructure = (): ProcessInfrastructure => ({
  enabled: false,
  redis: null,
  close: () => Promise.resolve()
})

export const createProcessInfrastructure = async ({
  config
}: {
  config: ServiceConfig
}): Promise<ProcessInfrastructure> => {
  const redisConfig = config.redis
  if (!redisConfig) {
    return createDisabledInfrastructure()
  }

  const client = createClient({
    url: redisConfig.url,
    socket: {
      connectTimeout: redisConfig.connectTimeoutMs
    }
  })

  try {
    await client.connect()
  } catch (error) {
    await Promise.allSettled([client.disconnect()])
    throw error
  }

  return {
    enabled: true,
    redis: toRedisClients({client, keyPrefix: redisConfig.keyPrefix}),
    close: async () => {
      await Promise.allSettled([client.quit()])
    }
  }
}
