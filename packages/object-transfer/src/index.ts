export {createLocalStorageBackend} from './backends/local'
export {createS3Client, createS3StorageBackend, toS3ObjectClient, type S3ClientConfig} from './backends/s3'
export type {ObjectLocation, ObjectTransfer, S3ObjectClient, S3RequestOptions, StorageBackend, UploadKeyHint} from './contracts'
export {abortedTransfer, classifyStorageError, isTransferError, TransferError, transferErrorCodes, type TransferErrorCode} from './errors'
export {withTransferRetry, type RetryPolicy} from './retry'
export {buildOutputKey, createObjectTransfer, type ObjectTransferOptions} from './transfer'
