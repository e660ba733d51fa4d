import {z} from 'zod'

const STORAGE_URI_PATTERN = /^([a-z][a-z0-9+.-]*):\/\/([^/\s]+)\/(\S.*)$/u

export type StorageUri = {
  scheme: string
  bucket: string
  key: string
}

export const parseStorageUri = (value: string): StorageUri | null => {
  const match = STORAGE_URI_PATTERN.exec(value)
  if (!match) {
    return null
  }

  const [, scheme, bucket, key] = match
  if (!scheme || !bucket || !key) {
    return null
  }

  return {scheme, bucket, key}
}

export const formatStorageUri = ({scheme, bucket, key}: StorageUri) => `${scheme}://${bucket}/${key}`

export const StorageUriSchema = z
  .string()
  .max(2048)
  .refine(value => parseStorageUri(value) !== null, 'must be a storage URI of the form scheme://bucket/key')
