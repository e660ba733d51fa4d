import {z} from 'zod'

import {ParameterNameSchema, SecretNameSchema, ServiceIdSchema, ServiceVersionSchema} from './identifiers'

export const ParameterTypeSchema = z.enum(['string', 'number', 'integer', 'boolean', 'array', 'object', 'file'])
export type ParameterType = z.infer<typeof ParameterTypeSchema>

export const FileDirectionSchema = z.enum(['input', 'output'])
export type FileDirection = z.infer<typeof FileDirectionSchema>

export const ParameterDeclarationSchema = z
  .object({
    name: ParameterNameSchema,
    type: ParameterTypeSchema,
    required: z.boolean().default(false),
    file_direction: FileDirectionSchema.optional(),
    description: z.string().max(1024).optional()
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.type === 'file' && !value.file_direction) {
      ctx.addIssue({
        code: 'custom',
        message: `file parameter ${value.name} must declare file_direction`,
        path: ['file_direction']
      })
    }

    if (value.type !== 'file' && value.file_direction) {
      ctx.addIssue({
        code: 'custom',
        message: `parameter ${value.name} declares file_direction but is not a file`,
        path: ['file_direction']
      })
    }
  })

export type ParameterDeclaration = z.infer<typeof ParameterDeclarationSchema>

export const SecretDeclarationSchema = z
  .object({
    name: SecretNameSchema,
    description: z.string().max(1024).optional()
  })
  .strict()

export type SecretDeclaration = z.infer<typeof SecretDeclarationSchema>

const findDuplicates = (names: string[]) => names.filter((name, index) => names.indexOf(name) !== index)

export const InterfaceSpecSchema = z
  .object({
    service_id: ServiceIdSchema,
    version: ServiceVersionSchema,
    parameters: z.array(ParameterDeclarationSchema).max(256),
    secrets: z.array(SecretDeclarationSchema).max(64)
  })
  .strict()
  .superRefine((value, ctx) => {
    for (const duplicate of findDuplicates(value.parameters.map(parameter => parameter.name))) {
      ctx.addIssue({code: 'custom', message: `parameter ${duplicate} is declared more than once`, path: ['parameters']})
    }

    for (const duplicate of findDuplicates(value.secrets.map(secret => secret.name))) {
      ctx.addIssue({code: 'custom', message: `secret ${duplicate} is declared more than once`, path: ['secrets']})
    }
  })

export type InterfaceSpec = z.infer<typeof InterfaceSpecSchema>
