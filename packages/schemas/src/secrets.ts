import {z} from 'zod'

import {SecretNameSchema, ServiceIdSchema} from './identifiers'

export const SecretWriteRequestSchema = z
  .object({
    service_id: ServiceIdSchema,
    secret_name: SecretNameSchema,
    secret_value: z.string().min(1).max(16_384)
  })
  .strict()

export type SecretWriteRequest = z.infer<typeof SecretWriteRequestSchema>

export const SecretMetadataSchema = z
  .object({
    name: SecretNameSchema,
    created_at: z.string(),
    updated_at: z.string(),
    last_used_at: z.string().nullable()
  })
  .strict()

export type SecretMetadata = z.infer<typeof SecretMetadataSchema>

export const SecretListResponseSchema = z
  .object({
    service_id: ServiceIdSchema,
    secrets: z.array(SecretMetadataSchema)
  })
  .strict()

export type SecretListResponse = z.infer<typeof SecretListResponseSchema>
