import {createCipheriv, createDecipheriv, randomBytes} from 'node:crypto';

import {KeyringInputSchema, type KeyringInput} from './contracts.js';
import {err, ok, type CryptoErrorCode, type CryptoResult} from './errors.js';

export const DATA_KEY_BYTES = 32;
export const AES_GCM_IV_BYTES = 12;
export const AES_GCM_TAG_BYTES = 16;

export type WrappedDataKey = {
  key_id: string;
  wrapped_data_key: Buffer;
};

/**
 * Wraps and unwraps per-record data keys. Implementations backed by a remote
 * KMS can satisfy the same contract; the in-process keyring below is the only
 * one shipped here.
 */
export type KeyManagementService = {
  activeKeyId: string;
  wrapDataKey: (input: {data_key: Buffer; aad: Buffer}) => Promise<WrappedDataKey> | WrappedDataKey;
  unwrapDataKey: (input: {key_id: string; wrapped_data_key: Buffer; aad: Buffer}) => Promise<Buffer> | Buffer;
};

export class KeyManagementError extends Error {
  public readonly code: CryptoErrorCode;

  public constructor(code: CryptoErrorCode, message: string) {
    super(message);
    this.name = 'KeyManagementError';
    this.code = code;
  }
}

export const createAesGcmKeyring = (input: KeyringInput): CryptoResult<KeyManagementService> => {
  const parsed = KeyringInputSchema.safeParse(input);
  if (!parsed.success) {
    return err('invalid_input', parsed.error.issues.map(issue => issue.message).join('; '));
  }

  const keyring = new Map<string, Buffer>();
  for (const [keyId, encodedKey] of Object.entries(parsed.data.keys)) {
    const key = Buffer.from(encodedKey, 'base64');
    if (key.length !== DATA_KEY_BYTES) {
      return err('invalid_key_length', `Key ${keyId} must decode to exactly ${DATA_KEY_BYTES} bytes`);
    }
    keyring.set(keyId, key);
  }

  if (!keyring.has(parsed.data.active_key_id)) {
    return err('kms_key_not_found', `active_key_id ${parsed.data.active_key_id} does not exist in keys`);
  }

  const requireKey = (keyId: string) => {
    const key = keyring.get(keyId);
    if (!key) {
      throw new KeyManagementError('kms_key_not_found', `Key id ${keyId} was not found in keyring`);
    }
    return key;
  };

  const service: KeyManagementService = {
    activeKeyId: parsed.data.active_key_id,
    wrapDataKey: ({data_key, aad}) => {
      const iv = randomBytes(AES_GCM_IV_BYTES);
      const cipher = createCipheriv('aes-256-gcm', requireKey(parsed.data.active_key_id), iv);
      cipher.setAAD(aad);
      const encrypted = Buffer.concat([cipher.update(data_key), cipher.final()]);

      return {
        key_id: parsed.data.active_key_id,
        wrapped_data_key: Buffer.concat([iv, cipher.getAuthTag(), encrypted])
      };
    },
    unwrapDataKey: ({key_id, wrapped_data_key, aad}) => {
      const key = requireKey(key_id);
      if (wrapped_data_key.length !== AES_GCM_IV_BYTES + AES_GCM_TAG_BYTES + DATA_KEY_BYTES) {
        throw new KeyManagementError('invalid_envelope_payload', 'wrapped data key has invalid length');
      }

      try {
        const decipher = createDecipheriv('aes-256-gcm', key, wrapped_data_key.subarray(0, AES_GCM_IV_BYTES));
        decipher.setAAD(aad);
        decipher.setAuthTag(wrapped_data_key.subarray(AES_GCM_IV_BYTES, AES_GCM_IV_BYTES + AES_GCM_TAG_BYTES));
        return Buffer.concat([
          decipher.update(wrapped_data_key.subarray(AES_GCM_IV_BYTES + AES_GCM_TAG_BYTES)),
          decipher.final()
        ]);
      } catch {
        throw new KeyManagementError('kms_unwrap_failed', 'Unable to unwrap data key');
      }
    }
  };

  return ok(service);
};
