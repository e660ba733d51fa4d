import type {AuditEvent} from '@prefab-gateway/schemas'

import {AuditEventSearchFilterSchema, AuditEventSearchQuerySchema, type AuditEventSearchFilter} from './contracts'
import {err, ok, type AuditResult} from './errors'

export const normalizeAuditEventSearchFilter = (rawQuery: unknown): AuditResult<AuditEventSearchFilter> => {
  const parsedQuery = AuditEventSearchQuerySchema.safeParse(rawQuery)
  if (!parsedQuery.success) {
    return err('invalid_search_query', parsedQuery.error.message)
  }

  const query = parsedQuery.data
  const filter = AuditEventSearchFilterSchema.parse({
    ...(query.time_min ? {time_min: new Date(query.time_min)} : {}),
    ...(query.time_max ? {time_max: new Date(query.time_max)} : {}),
    ...(query.caller_id ? {caller_id: query.caller_id} : {}),
    ...(query.action ? {action: query.action} : {}),
    ...(query.outcome ? {outcome: query.outcome} : {}),
    limit: query.limit
  })

  if (filter.time_min && filter.time_max && filter.time_min > filter.time_max) {
    return err('invalid_time_range', 'time_min must be <= time_max')
  }

  return ok(filter)
}

export const buildAuditSearchPredicate = (filter: AuditEventSearchFilter) => (event: AuditEvent) => {
  const eventTime = new Date(event.timestamp)

  if (filter.time_min && eventTime < filter.time_min) {
    return false
  }

  if (filter.time_max && eventTime > filter.time_max) {
    return false
  }

  if (filter.caller_id && event.caller_id !== filter.caller_id) {
    return false
  }

  if (filter.action && event.action !== filter.action) {
    return false
  }

  if (filter.outcome && event.outcome !== filter.outcome) {
    return false
  }

  return true
}

/** Newest first, capped at the filter's limit. */
export const filterAuditEvents = ({events, filter}: {events: AuditEvent[]; filter: AuditEventSearchFilter}) =>
  events
    .filter(buildAuditSearchPredicate(filter))
    .sort((left, right) => right.timestamp.localeCompare(left.timestamp))
    .slice(0, filter.limit)
