import {z} from 'zod'

import {ServiceIdSchema, ServiceVersionSchema} from './identifiers'

export const ErrorKindSchema = z.enum([
  'unauthenticated',
  'permission_denied',
  'not_found',
  'validation_error',
  'bad_request',
  'service_unavailable',
  'service_not_found',
  'internal_error'
])

export type ErrorKind = z.infer<typeof ErrorKindSchema>

export const CallErrorSchema = z
  .object({
    kind: ErrorKindSchema,
    code: z.string().min(1),
    message: z.string()
  })
  .strict()

export type CallError = z.infer<typeof CallErrorSchema>

export const CallStatusSchema = z.enum(['SUCCESS', 'FAILURE'])
export type CallStatus = z.infer<typeof CallStatusSchema>

export const CallResultSchema = z.discriminatedUnion('status', [
  z
    .object({
      call_index: z.number().int().gte(0),
      service_id: ServiceIdSchema,
      version: ServiceVersionSchema,
      status: z.literal('SUCCESS'),
      output: z.record(z.string(), z.unknown())
    })
    .strict(),
  z
    .object({
      call_index: z.number().int().gte(0),
      service_id: ServiceIdSchema,
      version: ServiceVersionSchema,
      status: z.literal('FAILURE'),
      error: CallErrorSchema
    })
    .strict()
])

export type CallResult = z.infer<typeof CallResultSchema>

export const JobStatusSchema = z.enum(['COMPLETED', 'PARTIAL', 'FAILED'])
export type JobStatus = z.infer<typeof JobStatusSchema>

export const JobSchema = z
  .object({
    job_id: z.string().min(1),
    status: JobStatusSchema,
    results: z.array(CallResultSchema)
  })
  .strict()

export type Job = z.infer<typeof JobSchema>

export const ContinuationPolicySchema = z.enum(['abort', 'continue'])
export type ContinuationPolicy = z.infer<typeof ContinuationPolicySchema>
