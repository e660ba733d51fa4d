import {AuditEventSchema, type AuditEvent} from '@prefab-gateway/schemas'

import type {AuditEventSearchFilter} from './contracts'
import {filterAuditEvents} from './search'

export type AuditStoreAdapter = {
  appendAuditEvent: (input: {event: AuditEvent}) => Promise<void> | void
  queryAuditEvents: (input: {filter: AuditEventSearchFilter}) => Promise<AuditEvent[]> | AuditEvent[]
}

const cloneAuditEvent = (event: AuditEvent): AuditEvent => AuditEventSchema.parse(event)

/** Keeps the most recent `maxEvents` events; older ones are dropped first. */
export const createInMemoryAuditStore = ({maxEvents = 10_000}: {maxEvents?: number} = {}): AuditStoreAdapter & {
  size: () => number
} => {
  const events: AuditEvent[] = []

  return {
    appendAuditEvent: ({event}) => {
      events.push(cloneAuditEvent(event))
      if (events.length > maxEvents) {
        events.splice(0, events.length - maxEvents)
      }
    },
    queryAuditEvents: ({filter}) => filterAuditEvents({events, filter}).map(cloneAuditEvent),
    size: () => events.length
  }
}
