import {randomUUID} from 'node:crypto'
import {mkdir, rm} from 'node:fs/promises'
import {basename, extname, join} from 'node:path'

import {createNoopLogger, type StructuredLogger} from '@prefab-gateway/logging'
import {formatStorageUri, parseStorageUri} from '@prefab-gateway/schemas'

import type {ObjectTransfer, StorageBackend} from './contracts'
import {TransferError} from './errors'
import {withTransferRetry, type RetryPolicy} from './retry'

export type ObjectTransferOptions = {
  backends: StorageBackend[]
  output: {
    scheme: string
    bucket: string
    prefix: string
  }
  retry: RetryPolicy
  logger?: StructuredLogger
  now?: () => Date
  generateId?: () => string
}

const safeFileName = (key: string) => {
  const cleaned = basename(key).replace(/[^A-Za-z0-9._-]/gu, '_')
  return cleaned.length > 0 && cleaned !== '.' && cleaned !== '..' ? cleaned.slice(-128) : 'object'
}

const pad = (value: number) => String(value).padStart(2, '0')

/**
 * `{prefix}/{YYYY}/{MM}/{DD}/{request_id}/{uuid}{ext}` in UTC. A fresh uuid per
 * upload means a key is never reused, even for identical content.
 */
export const buildOutputKey = ({
  prefix,
  requestId,
  localPath,
  date,
  id
}: {
  prefix: string
  requestId: string
  localPath: string
  date: Date
  id: string
}) => {
  const extension = extname(localPath).replace(/[^A-Za-z0-9.]/gu, '').slice(0, 16)
  const segments = [
    prefix.replace(/^\/+|\/+$/gu, ''),
    String(date.getUTCFullYear()),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
    encodeURIComponent(requestId),
    `${id}${extension}`
  ]
  return segments.filter(segment => segment.length > 0).join('/')
}

export const createObjectTransfer = ({
  backends,
  output,
  retry,
  logger = createNoopLogger(),
  now = () => new Date(),
  generateId = randomUUID
}: ObjectTransferOptions): ObjectTransfer => {
  const backendsByScheme = new Map(backends.map(backend => [backend.scheme, backend]))

  const requireBackend = (scheme: string) => {
    const backend = backendsByScheme.get(scheme)
    if (!backend) {
      throw new TransferError({code: 'unsupported_scheme', message: `No storage backend handles scheme '${scheme}'`})
    }
    return backend
  }

  const logRetry =
    (operation: 'download' | 'upload', uri: string) =>
    ({attempt, error, delayMs}: {attempt: number; error: TransferError; delayMs: number}) => {
      logger.warn({
        event: `transfer.${operation}.retry`,
        component: 'object_transfer',
        message: 'Transient storage failure, retrying',
        reason_code: error.code,
        metadata: {uri, attempt, delay_ms: delayMs}
      })
    }

  return {
    download: async ({uri, destDir, signal}) => {
      const location = parseStorageUri(uri)
      if (!location) {
        throw new TransferError({code: 'invalid_uri', message: 'Input reference is not a storage URI'})
      }

      const backend = requireBackend(location.scheme)
      const inputsDir = join(destDir, 'inputs')
      await mkdir(inputsDir, {recursive: true})
      const destination = join(inputsDir, `${generateId().slice(0, 8)}-${safeFileName(location.key)}`)

      try {
        await withTransferRetry(
          retry,
          () => backend.readToFile({bucket: location.bucket, key: location.key, destination, signal}),
          logRetry('download', uri),
          signal
        )
      } catch (error) {
        await rm(destination, {force: true})
        throw error
      }

      logger.debug({
        event: 'transfer.download.completed',
        component: 'object_transfer',
        metadata: {uri}
      })
      return destination
    },
    upload: async ({localPath, keyHint, signal}) => {
      const backend = requireBackend(output.scheme)
      const key = buildOutputKey({
        prefix: output.prefix,
        requestId: keyHint.requestId,
        localPath,
        date: now(),
        id: generateId()
      })
      const uri = formatStorageUri({scheme: output.scheme, bucket: output.bucket, key})

      await withTransferRetry(
        retry,
        () => backend.writeFromFile({bucket: output.bucket, key, source: localPath, signal}),
        logRetry('upload', uri),
        signal
      )

      logger.debug({
        event: 'transfer.upload.completed',
        component: 'object_transfer',
        metadata: {uri}
      })
      return uri
    }
  }
}
