import {z} from 'zod'

// service ids double as DNS labels when endpoints are resolved from a URL template
export const ServiceIdSchema = z
  .string()
  .min(1)
  .max(63)
  .regex(/^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/u, 'service_id must be a lowercase DNS label')

export const ServiceVersionSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/u, 'version contains unsupported characters')

export const SecretNameSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/u, 'secret name must be an identifier')

export const ParameterNameSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/u, 'parameter name must be an identifier')

export const CallerIdSchema = z.string().min(1).max(256)

export type ServiceId = z.infer<typeof ServiceIdSchema>
export type ServiceVersion = z.infer<typeof ServiceVersionSchema>
export type SecretName = z.infer<typeof SecretNameSchema>
