import {EnvelopeCiphertextSchema} from '@prefab-gateway/crypto'
import {CallerIdSchema, SecretNameSchema, ServiceIdSchema} from '@prefab-gateway/schemas'
import {z} from 'zod'

export const SecretKeySchema = z
  .object({
    callerId: CallerIdSchema,
    serviceId: ServiceIdSchema,
    name: SecretNameSchema
  })
  .strict()

export type SecretKey = z.infer<typeof SecretKeySchema>

export const SecretRecordSchema = z
  .object({
    caller_id: CallerIdSchema,
    service_id: ServiceIdSchema,
    name: SecretNameSchema,
    envelope: EnvelopeCiphertextSchema,
    created_at: z.string(),
    updated_at: z.string(),
    last_used_at: z.string().nullable()
  })
  .strict()

export type SecretRecord = z.infer<typeof SecretRecordSchema>

export type SecretRecordStore = {
  read: (key: SecretKey) => Promise<SecretRecord | null>
  write: (record: SecretRecord) => Promise<void>
  remove: (key: SecretKey) => Promise<boolean>
  listForService: (input: {callerId: string; serviceId: string}) => Promise<SecretRecord[]>
}

/** The hash commands the redis-backed store issues. */
export type SecretHashClient = {
  hGet: (key: string, field: string) => Promise<string | null>
  hSet: (key: string, field: string, value: string) => Promise<void>
  hDel: (key: string, field: string) => Promise<number>
  hGetAll: (key: string) => Promise<Record<string, string>>
}
