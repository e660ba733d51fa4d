import {buildEnvelopeAad, decryptWithEnvelope, encryptWithEnvelope, type KeyManagementService} from '@prefab-gateway/crypto'
import {createNoopLogger, type StructuredLogger} from '@prefab-gateway/logging'
import type {SecretMetadata} from '@prefab-gateway/schemas'

import {SecretKeySchema, type SecretKey, type SecretRecordStore} from './contracts'
import {err, ok, type VaultResult} from './errors'
import {KeyedMutex} from './keyed-mutex'
import {createInMemorySecretRecordStore} from './stores'

export type SecretVaultOptions = {
  kms: KeyManagementService
  store?: SecretRecordStore
  logger?: StructuredLogger
  now?: () => Date
}

const aadFor = ({callerId, serviceId, name}: SecretKey) =>
  buildEnvelopeAad({caller_id: callerId, service_id: serviceId, name})

const lockKey = ({callerId, serviceId, name}: SecretKey) => JSON.stringify([callerId, serviceId, name])

/**
 * Per-caller secret storage. Values are sealed with envelope encryption whose
 * AAD names the owning caller, service and secret, so a record can only be
 * opened under the exact key it was written for.
 */
export class SecretVault {
  private readonly kms: KeyManagementService
  private readonly store: SecretRecordStore
  private readonly logger: StructuredLogger
  private readonly now: () => Date
  private readonly writes = new KeyedMutex()

  public constructor({kms, store, logger, now}: SecretVaultOptions) {
    this.kms = kms
    this.store = store ?? createInMemorySecretRecordStore()
    this.logger = logger ?? createNoopLogger()
    this.now = now ?? (() => new Date())
  }

  public async get(rawKey: SecretKey): Promise<VaultResult<string>> {
    const parsedKey = SecretKeySchema.safeParse(rawKey)
    if (!parsedKey.success) {
      return err('secret_key_invalid', parsedKey.error.issues.map(issue => issue.message).join('; '))
    }

    const key = parsedKey.data
    const record = await this.store.read(key)
    if (!record) {
      return err('secret_not_found', `Secret '${key.name}' is not configured for service '${key.serviceId}'`)
    }

    const opened = await decryptWithEnvelope({envelope: record.envelope, kms: this.kms, expectedAad: aadFor(key)})
    if (!opened.ok) {
      this.logger.error({
        event: 'secret.decrypt.failed',
        component: 'secret_vault',
        message: 'Stored secret could not be decrypted',
        service_id: key.serviceId,
        reason_code: opened.error.code,
        metadata: {name: key.name}
      })
      return err('secret_decrypt_failed', `Secret '${key.name}' could not be decrypted`)
    }

    const value = opened.value.toString('utf8')
    opened.value.fill(0)
    await this.touchLastUsed(key)
    return ok(value)
  }

  public async put({value, ...rawKey}: SecretKey & {value: string}): Promise<VaultResult<void>> {
    const parsedKey = SecretKeySchema.safeParse(rawKey)
    if (!parsedKey.success) {
      return err('secret_key_invalid', parsedKey.error.issues.map(issue => issue.message).join('; '))
    }

    const key = parsedKey.data
    return this.writes.runExclusive(lockKey(key), async () => {
      const plaintext = Buffer.from(value, 'utf8')
      const sealed = await encryptWithEnvelope({plaintext, kms: this.kms, aad: aadFor(key)})
      plaintext.fill(0)
      if (!sealed.ok) {
        return err('secret_encrypt_failed', sealed.error.message)
      }

      const existing = await this.store.read(key)
      const timestamp = this.now().toISOString()
      await this.store.write({
        caller_id: key.callerId,
        service_id: key.serviceId,
        name: key.name,
        envelope: sealed.value,
        created_at: existing?.created_at ?? timestamp,
        updated_at: timestamp,
        last_used_at: existing?.last_used_at ?? null
      })

      return ok(undefined)
    })
  }

  public async delete(rawKey: SecretKey): Promise<VaultResult<void>> {
    const parsedKey = SecretKeySchema.safeParse(rawKey)
    if (!parsedKey.success) {
      return err('secret_key_invalid', parsedKey.error.issues.map(issue => issue.message).join('; '))
    }

    const key = parsedKey.data
    const removed = await this.writes.runExclusive(lockKey(key), () => this.store.remove(key))
    return removed
      ? ok(undefined)
      : err('secret_not_found', `Secret '${key.name}' is not configured for service '${key.serviceId}'`)
  }

  public async list({callerId, serviceId}: {callerId: string; serviceId: string}): Promise<SecretMetadata[]> {
    const records = await this.store.listForService({callerId, serviceId})
    return records
      .map(record => ({
        name: record.name,
        created_at: record.created_at,
        updated_at: record.updated_at,
        last_used_at: record.last_used_at
      }))
      .sort((left, right) => left.name.localeCompare(right.name))
  }

  private async touchLastUsed(key: SecretKey) {
    await this.writes.runExclusive(lockKey(key), async () => {
      const current = await this.store.read(key)
      if (current) {
        await this.store.write({...current, last_used_at: this.now().toISOString()})
      }
    })
  }
}

export const createSecretVault = (options: SecretVaultOptions) => new SecretVault(options)
