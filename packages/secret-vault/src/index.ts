export {
  SecretKeySchema,
  SecretRecordSchema,
  type SecretHashClient,
  type SecretKey,
  type SecretRecord,
  type SecretRecordStore
} from './contracts'
export {vaultErrorCodes, type VaultErrorCode, type VaultResult} from './errors'
export {KeyedMutex} from './keyed-mutex'
export {createSecretVault, SecretVault, type SecretVaultOptions} from './service'
export {createInMemorySecretRecordStore, createRedisSecretRecordStore} from './stores'
