import {createNoopLogger, type StructuredLogger} from '@prefab-gateway/logging'
import {formatStorageUri, parseStorageUri} from '@prefab-gateway/schemas'

import {AccessControlError, type AccessControl, type AclSetClient} from './contracts'

// one spelling per object so that grants and checks compare equal
const normalizeUri = (uri: string) => {
  const parsed = parseStorageUri(uri.trim())
  return parsed ? formatStorageUri(parsed) : null
}

const requireUri = (uri: string) => {
  const normalized = normalizeUri(uri)
  if (!normalized) {
    throw new AccessControlError('Cannot grant access to malformed storage URI')
  }
  return normalized
}

type OwnershipIndex = {
  has: (callerId: string, uri: string) => Promise<boolean>
  add: (callerId: string, uri: string) => Promise<boolean>
  members: (callerId: string) => Promise<string[]>
}

const createAccessControl = ({
  index,
  logger = createNoopLogger()
}: {
  index: OwnershipIndex
  logger?: StructuredLogger
}): AccessControl => ({
  canRead: async ({callerId, uri}) => {
    const normalized = normalizeUri(uri)
    const allowed = normalized !== null && (await index.has(callerId, normalized))
    if (!allowed) {
      logger.warn({
        event: 'acl.read.denied',
        component: 'access_control',
        message: 'Caller has no read access to object',
        caller_id: callerId,
        reason_code: normalized ? 'acl_not_granted' : 'acl_uri_invalid',
        metadata: {uri}
      })
    }
    return allowed
  },
  grantOwnership: async ({callerId, uri}) => {
    const normalized = requireUri(uri)
    const added = await index.add(callerId, normalized)
    logger.info({
      event: 'acl.ownership.granted',
      component: 'access_control',
      message: added ? 'Ownership granted' : 'Ownership already held',
      caller_id: callerId,
      metadata: {uri: normalized}
    })
  },
  listOwned: async ({callerId}) => (await index.members(callerId)).sort()
})

export const createInMemoryAccessControl = ({logger}: {logger?: StructuredLogger} = {}): AccessControl => {
  const grants = new Map<string, Set<string>>()

  return createAccessControl({
    logger,
    index: {
      has: (callerId, uri) => Promise.resolve(grants.get(callerId)?.has(uri) ?? false),
      add: (callerId, uri) => {
        const owned = grants.get(callerId) ?? new Set<string>()
        const added = !owned.has(uri)
        owned.add(uri)
        grants.set(callerId, owned)
        return Promise.resolve(added)
      },
      members: callerId => Promise.resolve([...(grants.get(callerId) ?? [])])
    }
  })
}

export const createRedisAccessControl = ({
  client,
  keyPrefix,
  logger
}: {
  client: AclSetClient
  keyPrefix: string
  logger?: StructuredLogger
}): AccessControl => {
  const setKey = (callerId: string) => `${keyPrefix}:acl:${encodeURIComponent(callerId)}`

  return createAccessControl({
    logger,
    index: {
      has: (callerId, uri) => client.sIsMember(setKey(callerId), uri),
      add: async (callerId, uri) => (await client.sAdd(setKey(callerId), uri)) > 0,
      members: callerId => client.sMembers(setKey(callerId))
    }
  })
}
