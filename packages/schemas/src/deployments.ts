import {z} from 'zod'

import {ServiceIdSchema, ServiceVersionSchema} from './identifiers'

export const DeploymentEventTypeSchema = z.enum(['deployment.started', 'deployment.succeeded', 'deployment.failed'])
export type DeploymentEventType = z.infer<typeof DeploymentEventTypeSchema>

export const DeploymentEventSchema = z
  .object({
    event_id: z.string().min(1).max(128),
    event_type: DeploymentEventTypeSchema,
    service_id: ServiceIdSchema,
    version: ServiceVersionSchema,
    endpoint_url: z.url({protocol: /^https?$/u}).optional(),
    error: z.string().max(4096).optional(),
    occurred_at: z.iso.datetime({offset: true})
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.event_type === 'deployment.succeeded' && !value.endpoint_url) {
      ctx.addIssue({
        code: 'custom',
        message: 'deployment.succeeded events must carry endpoint_url',
        path: ['endpoint_url']
      })
    }
  })

export type DeploymentEvent = z.infer<typeof DeploymentEventSchema>

export const DeploymentStatusSchema = z.enum(['deploying', 'deployed', 'failed'])
export type DeploymentStatus = z.infer<typeof DeploymentStatusSchema>

export const DeploymentRecordSchema = z
  .object({
    service_id: ServiceIdSchema,
    version: ServiceVersionSchema,
    status: DeploymentStatusSchema,
    endpoint_url: z.string().optional(),
    error: z.string().optional(),
    updated_at: z.string()
  })
  .strict()

export type DeploymentRecord = z.infer<typeof DeploymentRecordSchema>

export const WebhookEventStatusSchema = z.enum(['processed', 'failed'])

export const WebhookEventRecordSchema = z
  .object({
    event_id: z.string().min(1),
    event_type: DeploymentEventTypeSchema,
    status: WebhookEventStatusSchema,
    received_at: z.string(),
    error: z.string().optional()
  })
  .strict()

export type WebhookEventRecord = z.infer<typeof WebhookEventRecordSchema>
