import {
  CallOutputReferenceSchema,
  parseStorageUri,
  type CallOutputReference,
  type InterfaceSpec,
  type ParameterDeclaration
} from '@prefab-gateway/schemas'

import {pipelineError, type PipelineError, type PipelineErrorCode} from './errors'

export type FileInputSource = {kind: 'uri'; uri: string} | {kind: 'call_output'; reference: CallOutputReference}

export type FileInput = {
  name: string
  source: FileInputSource
}

export type ValidatedInputs = {
  /** Inputs to forward as-is; file inputs are absent until staged. */
  values: Record<string, unknown>
  fileInputs: FileInput[]
  outputs: ParameterDeclaration[]
}

export type ValidationResult = {ok: true; value: ValidatedInputs} | {ok: false; error: PipelineError}

type Issue = {code: PipelineErrorCode; message: string}

const describeValue = (value: unknown) => {
  if (value === null) {
    return 'null'
  }
  if (Array.isArray(value)) {
    return 'array'
  }
  if (typeof value === 'number' && Number.isInteger(value)) {
    return 'integer'
  }
  return typeof value
}

const matchesType = (declaration: ParameterDeclaration, value: unknown) => {
  switch (declaration.type) {
    case 'string':
      return typeof value === 'string'
    case 'number':
      return typeof value === 'number' && Number.isFinite(value)
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value)
    case 'boolean':
      return typeof value === 'boolean'
    case 'array':
      return Array.isArray(value)
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value)
    case 'file':
      return true
  }
}

const toFileSource = ({
  name,
  value,
  callIndex
}: {
  name: string
  value: unknown
  callIndex: number
}): FileInputSource | Issue => {
  if (typeof value === 'string') {
    return parseStorageUri(value)
      ? {kind: 'uri', uri: value}
      : {code: 'invalid_file_reference', message: `parameter ${name} must be a storage URI (scheme://bucket/key)`}
  }

  const reference = CallOutputReferenceSchema.safeParse(value)
  if (!reference.success) {
    return {
      code: 'invalid_file_reference',
      message: `parameter ${name} must be a storage URI or a {from_call, output} reference`
    }
  }

  if (reference.data.from_call >= callIndex) {
    return {
      code: 'invalid_file_reference',
      message: `parameter ${name} references call ${reference.data.from_call}, which does not run before call ${callIndex}`
    }
  }

  return {kind: 'call_output', reference: reference.data}
}

/**
 * Checks call inputs against the interface spec. Every problem is reported in
 * the message; the code is that of the first problem found.
 */
export const validateCallInputs = ({
  spec,
  inputs,
  callIndex
}: {
  spec: InterfaceSpec
  inputs: Record<string, unknown>
  callIndex: number
}): ValidationResult => {
  const issues: Issue[] = []
  const declared = new Map(spec.parameters.map(parameter => [parameter.name, parameter]))
  const values: Record<string, unknown> = {}
  const fileInputs: FileInput[] = []

  for (const name of Object.keys(inputs)) {
    if (!declared.has(name)) {
      issues.push({code: 'unknown_parameter', message: `parameter ${name} is not declared by ${spec.service_id}@${spec.version}`})
    }
  }

  for (const parameter of spec.parameters) {
    const present = Object.hasOwn(inputs, parameter.name)
    const value = inputs[parameter.name]

    if (parameter.file_direction === 'output') {
      if (present) {
        issues.push({
          code: 'output_parameter_supplied',
          message: `parameter ${parameter.name} is an output and must not be supplied`
        })
      }
      continue
    }

    if (!present) {
      if (parameter.required) {
        issues.push({code: 'missing_parameter', message: `parameter ${parameter.name} is required`})
      }
      continue
    }

    if (parameter.type === 'file') {
      const source = toFileSource({name: parameter.name, value, callIndex})
      if ('code' in source) {
        issues.push(source)
      } else {
        fileInputs.push({name: parameter.name, source})
      }
      continue
    }

    if (!matchesType(parameter, value)) {
      issues.push({
        code: 'type_mismatch',
        message: `parameter ${parameter.name} must be ${parameter.type}, got ${describeValue(value)}`
      })
      continue
    }

    values[parameter.name] = value
  }

  const [first] = issues
  if (first) {
    return {
      ok: false,
      error: pipelineError('validation_error', first.code, issues.map(issue => issue.message).join('; '))
    }
  }

  return {
    ok: true,
    value: {values, fileInputs, outputs: spec.parameters.filter(parameter => parameter.file_direction === 'output')}
  }
}
