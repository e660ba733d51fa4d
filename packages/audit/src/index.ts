export {
  AuditEventListResponseSchema,
  AuditEventSearchFilterSchema,
  AuditEventSearchQuerySchema,
  AuditRecordInputSchema,
  type AuditEvent,
  type AuditEventListResponse,
  type AuditEventSearchFilter,
  type AuditEventSearchQuery,
  type AuditRecordInput
} from './contracts'
export {auditErrorCodes, err, ok, type AuditError, type AuditErrorCode, type AuditResult} from './errors'
export {buildAuditSearchPredicate, filterAuditEvents, normalizeAuditEventSearchFilter} from './search'
export {AuditService, createAuditService, type AuditServiceDependencies} from './service'
export {createInMemoryAuditStore, type AuditStoreAdapter} from './store'
