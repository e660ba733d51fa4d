import {z} from 'zod'

import {ServiceIdSchema, ServiceVersionSchema} from './identifiers'

export const MAX_CALLS_PER_REQUEST = 50

export const CallOutputReferenceSchema = z
  .object({
    from_call: z.number().int().gte(0),
    output: z.string().min(1).max(128)
  })
  .strict()

export type CallOutputReference = z.infer<typeof CallOutputReferenceSchema>

export const CallRequestSchema = z
  .object({
    service_id: ServiceIdSchema,
    version: ServiceVersionSchema,
    inputs: z.record(z.string(), z.unknown()).default({})
  })
  .strict()

export type CallRequest = z.infer<typeof CallRequestSchema>

export const RunRequestSchema = z
  .object({
    calls: z.array(CallRequestSchema).min(1).max(MAX_CALLS_PER_REQUEST)
  })
  .strict()

export type RunRequest = z.infer<typeof RunRequestSchema>
