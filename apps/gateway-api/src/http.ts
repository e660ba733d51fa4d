import {randomUUID} from 'node:crypto'
import type {IncomingMessage, ServerResponse} from 'node:http'

import {ErrorResponseSchema} from '@prefab-gateway/schemas'
import {z} from 'zod'

import {badRequest, unsupportedMediaType} from './errors'

const DEFAULT_SECURITY_HEADERS: Record<string, string> = {
  'x-content-type-options': 'nosniff',
  'x-frame-options': 'DENY',
  'referrer-policy': 'no-referrer',
  'cross-origin-resource-policy': 'same-origin',
  'cache-control': 'no-store'
}

// application/json, optionally with parameters, or any +json suffix type
const isJsonContentType = (contentTypeHeader: string | undefined) => {
  const [mediaType = ''] = (contentTypeHeader ?? '').split(';')
  const normalized = mediaType.trim().toLowerCase()
  return normalized === 'application/json' || (normalized.startsWith('application/') && normalized.endsWith('+json'))
}

const formatIssues = (issues: z.ZodError['issues']) =>
  issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message))
    .join('; ')

const responseHeaders = (correlationId: string, extra?: Record<string, string>) => ({
  ...DEFAULT_SECURITY_HEADERS,
  'x-correlation-id': correlationId,
  ...extra
})

export const extractCorrelationId = (request: IncomingMessage) => {
  const header = request.headers['x-correlation-id']
  const value = Array.isArray(header) ? header[0] : header
  if (typeof value !== 'string') {
    return randomUUID()
  }

  const trimmed = value.trim()
  if (trimmed.length === 0 || trimmed.length > 128) {
    return randomUUID()
  }

  return trimmed
}

export const readBodyBuffer = async ({
  request,
  maxBodyBytes
}: {
  request: IncomingMessage
  maxBodyBytes: number
}) => {
  const declaredLength = Number(request.headers['content-length'] ?? 0)
  if (declaredLength > maxBodyBytes) {
    throw badRequest('request_body_too_large', `Request body exceeds ${maxBodyBytes} bytes`)
  }

  const chunks: Buffer[] = []
  let size = 0

  for await (const chunk of request) {
    let bufferChunk: Buffer
    if (typeof chunk === 'string') {
      bufferChunk = Buffer.from(chunk, 'utf8')
    } else if (chunk instanceof Uint8Array) {
      bufferChunk = Buffer.from(chunk)
    } else {
      throw badRequest('request_body_invalid', 'Request body contains an invalid chunk type')
    }

    size += bufferChunk.length
    if (size > maxBodyBytes) {
      throw badRequest('request_body_too_large', `Request body exceeds ${maxBodyBytes} bytes`)
    }

    chunks.push(bufferChunk)
  }

  return Buffer.concat(chunks)
}

export const requireJsonContentType = (request: IncomingMessage) => {
  if (!isJsonContentType(request.headers['content-type'])) {
    throw unsupportedMediaType('content_type_invalid', 'Content-Type must be application/json')
  }
}

/** Parses an already-read body; used where the raw bytes are needed as well, e.g. for signatures. */
export const parseJsonBuffer = <TSchema extends z.ZodType>({
  raw,
  schema
}: {
  raw: Buffer
  schema: TSchema
}): z.infer<TSchema> => {
  if (raw.length === 0) {
    throw badRequest('request_body_missing', 'Request body is required')
  }

  let parsedBody: unknown
  try {
    parsedBody = JSON.parse(raw.toString('utf8'))
  } catch {
    throw badRequest('request_body_invalid_json', 'Request body contains invalid JSON')
  }

  const parsed = schema.safeParse(parsedBody)
  if (!parsed.success) {
    throw badRequest('request_body_schema_invalid', formatIssues(parsed.error.issues))
  }

  return parsed.data
}

export const parseJsonBody = async <TSchema extends z.ZodType>({
  request,
  schema,
  maxBodyBytes
}: {
  request: IncomingMessage
  schema: TSchema
  maxBodyBytes: number
}): Promise<z.infer<TSchema>> => {
  requireJsonContentType(request)
  const raw = await readBodyBuffer({request, maxBodyBytes})
  return parseJsonBuffer({raw, schema})
}

export const parseQuery = <TSchema extends z.ZodType>({
  searchParams,
  schema
}: {
  searchParams: URLSearchParams
  schema: TSchema
}): z.infer<TSchema> => {
  const parsed = schema.safeParse(Object.fromEntries(searchParams.entries()))
  if (!parsed.success) {
    throw badRequest('query_invalid', formatIssues(parsed.error.issues))
  }

  return parsed.data
}

export const decodePathParam = (value: string) => {
  try {
    return decodeURIComponent(value)
  } catch {
    throw badRequest('path_param_invalid', 'Path parameter encoding is invalid')
  }
}

export const sendJson = ({
  response,
  status,
  correlationId,
  payload,
  headers
}: {
  response: ServerResponse
  status: number
  correlationId: string
  payload: unknown
  headers?: Record<string, string>
}) => {
  const body = Buffer.from(JSON.stringify(payload), 'utf8')

  response.writeHead(
    status,
    responseHeaders(correlationId, {
      'content-type': 'application/json; charset=utf-8',
      'content-length': String(body.length),
      ...headers
    })
  )
  response.end(body)
}

export const sendError = ({
  response,
  status,
  error,
  message,
  correlationId
}: {
  response: ServerResponse
  status: number
  error: string
  message: string
  correlationId: string
}) => {
  sendJson({
    response,
    status,
    correlationId,
    payload: ErrorResponseSchema.parse({error, message, correlation_id: correlationId})
  })
}

export const sendNoContent = ({
  response,
  correlationId
}: {
  response: ServerResponse
  correlationId: string
}) => {
  response.writeHead(204, responseHeaders(correlationId))
  response.end()
}
