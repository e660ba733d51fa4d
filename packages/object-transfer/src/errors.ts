export const transferErrorCodes = [
  'invalid_uri',
  'unsupported_scheme',
  'object_not_found',
  'access_denied',
  'transient',
  'transfer_failed',
  'transfer_aborted'
] as const

export type TransferErrorCode = (typeof transferErrorCodes)[number]

export class TransferError extends Error {
  public readonly code: TransferErrorCode
  public readonly retryable: boolean

  public constructor({code, message, cause}: {code: TransferErrorCode; message: string; cause?: unknown}) {
    super(message, cause === undefined ? undefined : {cause})
    this.name = 'TransferError'
    this.code = code
    this.retryable = code === 'transient'
  }
}

export const isTransferError = (value: unknown): value is TransferError => value instanceof TransferError

export const abortedTransfer = (cause?: unknown) =>
  new TransferError({code: 'transfer_aborted', message: 'Transfer was cancelled', cause})

const readField = (value: unknown, field: string): unknown =>
  typeof value === 'object' && value !== null && field in value ? Reflect.get(value, field) : undefined

const NETWORK_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND', 'EAI_AGAIN'])
const TRANSIENT_ERROR_NAMES = new Set([
  'TimeoutError',
  'RequestTimeout',
  'SlowDown',
  'Throttling',
  'ThrottlingException',
  'InternalError',
  'ServiceUnavailable'
])

/** Maps an S3 SDK or socket failure onto a transfer error code. */
export const classifyStorageError = (error: unknown): TransferErrorCode => {
  const name = readField(error, 'name')
  const code = readField(error, 'code')
  const status = readField(readField(error, '$metadata'), 'httpStatusCode')

  if (name === 'NoSuchKey' || name === 'NotFound' || name === 'NoSuchBucket' || status === 404) {
    return 'object_not_found'
  }

  if (name === 'AccessDenied' || status === 403) {
    return 'access_denied'
  }

  if (
    (typeof status === 'number' && status >= 500) ||
    (typeof name === 'string' && TRANSIENT_ERROR_NAMES.has(name)) ||
    (typeof code === 'string' && NETWORK_ERROR_CODES.has(code))
  ) {
    return 'transient'
  }

  return 'transfer_failed'
}
