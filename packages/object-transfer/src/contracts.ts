import type {Readable} from 'node:stream'

export type ObjectLocation = {
  bucket: string
  key: string
}

/** One storage system, addressed by the scheme of its URIs. */
export type StorageBackend = {
  scheme: string
  /** Writes the object to `destination`; throws TransferError. */
  readToFile: (input: ObjectLocation & {destination: string; signal?: AbortSignal}) => Promise<void>
  /** Stores the file at `source`; throws TransferError. */
  writeFromFile: (input: ObjectLocation & {source: string; signal?: AbortSignal}) => Promise<void>
}

export type UploadKeyHint = {
  requestId: string
}

export type ObjectTransfer = {
  download: (input: {uri: string; destDir: string; signal?: AbortSignal}) => Promise<string>
  upload: (input: {localPath: string; keyHint: UploadKeyHint; signal?: AbortSignal}) => Promise<string>
}

export type S3RequestOptions = {abortSignal?: AbortSignal}

export type S3ObjectClient = {
  getObject: (
    input: {Bucket: string; Key: string},
    options?: S3RequestOptions
  ) => Promise<{body: Readable | Uint8Array | undefined}>
  putObject: (
    input: {Bucket: string; Key: string; Body: Readable; ContentLength: number},
    options?: S3RequestOptions
  ) => Promise<void>
}
