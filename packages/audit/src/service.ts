import {randomUUID} from 'node:crypto'

import {sanitizeRecordForLog} from '@prefab-gateway/logging'
import {AuditEventSchema, type AuditEvent} from '@prefab-gateway/schemas'

import {AuditEventListResponseSchema, AuditRecordInputSchema, type AuditEventListResponse} from './contracts'
import {err, ok, storeFailure, type AuditResult} from './errors'
import {normalizeAuditEventSearchFilter} from './search'
import type {AuditStoreAdapter} from './store'

export type AuditServiceDependencies = {
  store: AuditStoreAdapter
  now?: () => Date
  generateId?: () => string
}

export class AuditService {
  public constructor(private readonly dependencies: AuditServiceDependencies) {}

  public async recordEvent({input}: {input: unknown}): Promise<AuditResult<AuditEvent>> {
    const parsedInput = AuditRecordInputSchema.safeParse(input)
    if (!parsedInput.success) {
      return err('invalid_input', parsedInput.error.message)
    }

    const event = AuditEventSchema.parse({
      event_id: (this.dependencies.generateId ?? randomUUID)(),
      timestamp: (this.dependencies.now ?? (() => new Date()))().toISOString(),
      action: parsedInput.data.action,
      caller_id: parsedInput.data.caller_id,
      correlation_id: parsedInput.data.correlation_id,
      outcome: parsedInput.data.outcome,
      metadata: sanitizeRecordForLog({value: parsedInput.data.metadata})
    })

    try {
      await this.dependencies.store.appendAuditEvent({event})
    } catch (error) {
      return storeFailure('storage_write_failed', error)
    }

    return ok(event)
  }

  public async queryEvents({query}: {query: unknown}): Promise<AuditResult<AuditEventListResponse>> {
    const filter = normalizeAuditEventSearchFilter(query)
    if (!filter.ok) {
      return filter
    }

    let events: AuditEvent[]
    try {
      events = await this.dependencies.store.queryAuditEvents({filter: filter.value})
    } catch (error) {
      return storeFailure('storage_query_failed', error)
    }

    return ok(AuditEventListResponseSchema.parse({events}))
  }
}

export const createAuditService = (dependencies: AuditServiceDependencies): AuditService =>
  new AuditService(dependencies)
