import {AuditActionSchema, AuditEventSchema, AuditOutcomeSchema, type AuditEvent} from '@prefab-gateway/schemas'
import {z} from 'zod'

export const AuditRecordInputSchema = z
  .object({
    action: AuditActionSchema,
    caller_id: z.string().min(1),
    correlation_id: z.string().min(1),
    outcome: AuditOutcomeSchema,
    metadata: z.record(z.string(), z.unknown()).default({})
  })
  .strict()
export type AuditRecordInput = z.input<typeof AuditRecordInputSchema>

export const AuditEventSearchQuerySchema = z
  .object({
    time_min: z.iso.datetime({offset: true}).optional(),
    time_max: z.iso.datetime({offset: true}).optional(),
    caller_id: z.string().min(1).optional(),
    action: AuditActionSchema.optional(),
    outcome: AuditOutcomeSchema.optional(),
    limit: z.coerce.number().int().gte(1).lte(500).default(100)
  })
  .strict()
export type AuditEventSearchQuery = z.input<typeof AuditEventSearchQuerySchema>

export const AuditEventSearchFilterSchema = z
  .object({
    time_min: z.date().optional(),
    time_max: z.date().optional(),
    caller_id: z.string().optional(),
    action: AuditActionSchema.optional(),
    outcome: AuditOutcomeSchema.optional(),
    limit: z.number().int()
  })
  .strict()
export type AuditEventSearchFilter = z.infer<typeof AuditEventSearchFilterSchema>

export const AuditEventListResponseSchema = z
  .object({
    events: z.array(AuditEventSchema)
  })
  .strict()
export type AuditEventListResponse = z.infer<typeof AuditEventListResponseSchema>

export {AuditEventSchema, type AuditEvent}
