import {z} from 'zod'

export const LogEventSchema = z
  .object({
    ts: z.string(),
    level: z.enum(['debug', 'info', 'warn', 'error', 'fatal']),
    service: z.string().min(1),
    env: z.string().min(1),
    event: z.string().min(1),
    component: z.string().min(1),
    message: z.string().optional(),
    correlation_id: z.string().min(1),
    request_id: z.string().min(1),
    caller_id: z.string().optional(),
    job_id: z.string().optional(),
    service_id: z.string().optional(),
    call_index: z.number().int().gte(0).optional(),
    reason_code: z.string().optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    route: z.string().optional(),
    method: z.string().optional(),
    metadata: z.record(z.string(), z.unknown())
  })
  .strict()

export type LogEvent = z.infer<typeof LogEventSchema>

export const AuditActionSchema = z.enum([
  'job.executed',
  'secret.written',
  'secret.deleted',
  'spec.published',
  'webhook.processed'
])

export type AuditAction = z.infer<typeof AuditActionSchema>

export const AuditOutcomeSchema = z.enum(['success', 'failure'])

export const AuditEventSchema = z
  .object({
    event_id: z.string().min(1),
    timestamp: z.string(),
    action: AuditActionSchema,
    caller_id: z.string().min(1),
    correlation_id: z.string().min(1),
    outcome: AuditOutcomeSchema,
    metadata: z.record(z.string(), z.unknown())
  })
  .strict()

export type AuditEvent = z.infer<typeof AuditEventSchema>

export const ErrorResponseSchema = z
  .object({
    error: z.string().min(1),
    message: z.string(),
    correlation_id: z.string().min(1)
  })
  .strict()

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>
