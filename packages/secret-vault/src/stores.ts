import {
  SecretRecordSchema,
  type SecretHashClient,
  type SecretKey,
  type SecretRecord,
  type SecretRecordStore
} from './contracts'

const memoryKey = ({callerId, serviceId, name}: SecretKey) => JSON.stringify([callerId, serviceId, name])

export const createInMemorySecretRecordStore = (): SecretRecordStore => {
  const records = new Map<string, SecretRecord>()

  return {
    read: key => Promise.resolve(structuredClone(records.get(memoryKey(key)) ?? null)),
    write: record => {
      records.set(memoryKey({callerId: record.caller_id, serviceId: record.service_id, name: record.name}), structuredClone(record))
      return Promise.resolve()
    },
    remove: key => Promise.resolve(records.delete(memoryKey(key))),
    listForService: ({callerId, serviceId}) =>
      Promise.resolve(
        [...records.values()]
          .filter(record => record.caller_id === callerId && record.service_id === serviceId)
          .map(record => structuredClone(record))
      )
  }
}

const parseRecord = (raw: string) => SecretRecordSchema.parse(JSON.parse(raw))

/**
 * One hash per (caller, service); fields are secret names holding the JSON
 * record. Caller ids are URI-encoded because they come from token subjects.
 */
export const createRedisSecretRecordStore = ({
  client,
  keyPrefix
}: {
  client: SecretHashClient
  keyPrefix: string
}): SecretRecordStore => {
  const hashKey = (callerId: string, serviceId: string) =>
    `${keyPrefix}:secrets:${encodeURIComponent(callerId)}:${serviceId}`

  return {
    read: async key => {
      const raw = await client.hGet(hashKey(key.callerId, key.serviceId), key.name)
      return raw === null ? null : parseRecord(raw)
    },
    write: async record => {
      await client.hSet(hashKey(record.caller_id, record.service_id), record.name, JSON.stringify(record))
    },
    remove: async key => (await client.hDel(hashKey(key.callerId, key.serviceId), key.name)) > 0,
    listForService: async ({callerId, serviceId}) =>
      Object.values(await client.hGetAll(hashKey(callerId, serviceId))).map(parseRecord)
  }
}
