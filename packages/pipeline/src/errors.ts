import type {CallError, ErrorKind} from '@prefab-gateway/schemas'

export const pipelineErrorCodes = [
  'spec_not_found',
  'spec_source_unavailable',
  'unknown_parameter',
  'missing_parameter',
  'type_mismatch',
  'invalid_file_reference',
  'output_parameter_supplied',
  'output_reference_unavailable',
  'input_access_denied',
  'input_object_not_found',
  'input_transfer_failed',
  'storage_unavailable',
  'secret_not_configured',
  'secret_unavailable',
  'endpoint_not_found',
  'invoke_timeout',
  'connection_failed',
  'downstream_error',
  'downstream_response_too_large',
  'invalid_downstream_response',
  'output_missing',
  'output_invalid',
  'output_outside_workspace',
  'output_upload_failed',
  'pipeline_timeout',
  'workspace_unavailable',
  'unexpected_error'
] as const

export type PipelineErrorCode = (typeof pipelineErrorCodes)[number]

/** A call failure: the caller-visible kind plus a stable reason code. */
export class PipelineError extends Error {
  public readonly kind: ErrorKind
  public readonly code: PipelineErrorCode

  public constructor({kind, code, message}: {kind: ErrorKind; code: PipelineErrorCode; message: string}) {
    super(message)
    this.name = 'PipelineError'
    this.kind = kind
    this.code = code
  }

  public toCallError(): CallError {
    return {kind: this.kind, code: this.code, message: this.message}
  }
}

export const isPipelineError = (value: unknown): value is PipelineError => value instanceof PipelineError

export const pipelineError = (kind: ErrorKind, code: PipelineErrorCode, message: string) =>
  new PipelineError({kind, code, message})
