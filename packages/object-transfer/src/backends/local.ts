import {copyFile, mkdir} from 'node:fs/promises'
import {dirname, resolve, sep} from 'node:path'

import type {StorageBackend} from '../contracts'
import {abortedTransfer, TransferError} from '../errors'

const fsErrorCode = (error: unknown) =>
  typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string' ? error.code : ''

/**
 * Filesystem-backed storage for development: `scheme://bucket/key` maps to
 * `<root>/<bucket>/<key>`.
 */
export const createLocalStorageBackend = ({root, scheme = 'local'}: {root: string; scheme?: string}): StorageBackend => {
  const resolvedRoot = resolve(root)

  const pathFor = (bucket: string, key: string) => {
    const candidate = resolve(resolvedRoot, bucket, key)
    if (!candidate.startsWith(`${resolvedRoot}${sep}`)) {
      throw new TransferError({code: 'invalid_uri', message: 'Object key escapes the storage root'})
    }
    return candidate
  }

  const toTransferError = (error: unknown, uri: string) => {
    if (error instanceof TransferError) {
      return error
    }

    switch (fsErrorCode(error)) {
      case 'ENOENT':
        return new TransferError({code: 'object_not_found', message: `Object ${uri} does not exist`, cause: error})
      case 'EACCES':
      case 'EPERM':
        return new TransferError({code: 'access_denied', message: `Object ${uri} is not accessible`, cause: error})
      case 'EBUSY':
      case 'EMFILE':
        return new TransferError({code: 'transient', message: `Object ${uri} is temporarily unavailable`, cause: error})
      default:
        return new TransferError({code: 'transfer_failed', message: `Transfer of ${uri} failed`, cause: error})
    }
  }

  return {
    scheme,
    // copies are not interruptible; a cancelled signal only stops them from starting
    readToFile: async ({bucket, key, destination, signal}) => {
      if (signal?.aborted) {
        throw abortedTransfer(signal.reason)
      }
      try {
        await copyFile(pathFor(bucket, key), destination)
      } catch (error) {
        throw toTransferError(error, `${scheme}://${bucket}/${key}`)
      }
    },
    writeFromFile: async ({bucket, key, source, signal}) => {
      if (signal?.aborted) {
        throw abortedTransfer(signal.reason)
      }
      try {
        const target = pathFor(bucket, key)
        await mkdir(dirname(target), {recursive: true})
        await copyFile(source, target)
      } catch (error) {
        throw toTransferError(error, `${scheme}://${bucket}/${key}`)
      }
    }
  }
}
