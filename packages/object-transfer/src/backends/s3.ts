import {createReadStream, createWriteStream} from 'node:fs'
import {stat, writeFile} from 'node:fs/promises'
import {Readable} from 'node:stream'
import {pipeline} from 'node:stream/promises'

import {GetObjectCommand, PutObjectCommand, S3Client} from '@aws-sdk/client-s3'

import type {S3ObjectClient, StorageBackend} from '../contracts'
import {abortedTransfer, classifyStorageError, TransferError} from '../errors'

export type S3ClientConfig = {
  region: string
  endpoint?: string
  forcePathStyle?: boolean
}

export const createS3Client = ({region, endpoint, forcePathStyle}: S3ClientConfig) =>
  new S3Client({
    region,
    ...(endpoint ? {endpoint} : {}),
    ...(forcePathStyle ? {forcePathStyle} : {})
  })

/** Adapts the SDK client to the two operations transfers need. */
export const toS3ObjectClient = (client: S3Client): S3ObjectClient => ({
  getObject: async (input, options) => {
    const output = await client.send(new GetObjectCommand(input), options)
    if (!output.Body) {
      return {body: undefined}
    }

    return {body: output.Body instanceof Readable ? output.Body : await output.Body.transformToByteArray()}
  },
  putObject: async (input, options) => {
    await client.send(new PutObjectCommand(input), options)
  }
})

const wrap = (error: unknown, action: string, bucket: string, key: string, signal?: AbortSignal) => {
  if (error instanceof TransferError) {
    return error
  }
  if (signal?.aborted) {
    return abortedTransfer(error)
  }

  const code = classifyStorageError(error)
  return new TransferError({code, message: `S3 ${action} failed for s3://${bucket}/${key} (${code})`, cause: error})
}

export const createS3StorageBackend = ({client, scheme = 's3'}: {client: S3ObjectClient; scheme?: string}): StorageBackend => ({
  scheme,
  readToFile: async ({bucket, key, destination, signal}) => {
    try {
      const {body} = await client.getObject({Bucket: bucket, Key: key}, {abortSignal: signal})
      if (body === undefined) {
        throw new TransferError({code: 'transfer_failed', message: `S3 object s3://${bucket}/${key} has no body`})
      }

      if (body instanceof Readable) {
        await pipeline(body, createWriteStream(destination), {signal})
      } else {
        await writeFile(destination, body, {signal})
      }
    } catch (error) {
      throw wrap(error, 'download', bucket, key, signal)
    }
  },
  writeFromFile: async ({bucket, key, source, signal}) => {
    try {
      const {size} = await stat(source)
      await client.putObject(
        {Bucket: bucket, Key: key, Body: createReadStream(source), ContentLength: size},
        {abortSignal: signal}
      )
    } catch (error) {
      throw wrap(error, 'upload', bucket, key, signal)
    }
  }
})
