import {createCipheriv, createDecipheriv, randomBytes, timingSafeEqual} from 'node:crypto';

import {EnvelopeCiphertextSchema, type EnvelopeCiphertext} from './contracts.js';
import {err, ok, type CryptoErrorCode, type CryptoResult} from './errors.js';
import {
  AES_GCM_IV_BYTES,
  AES_GCM_TAG_BYTES,
  DATA_KEY_BYTES,
  KeyManagementError,
  type KeyManagementService,
  type WrappedDataKey
} from './keyring.js';

const MAX_PLAINTEXT_BYTES = 1_048_576;

const fromKmsFailure = (failure: unknown, fallbackCode: CryptoErrorCode) =>
  failure instanceof KeyManagementError
    ? err(failure.code, failure.message)
    : err(fallbackCode, 'Key management operation failed');

/**
 * Canonical AAD for a flat string context: keys sorted, JSON encoded. Two
 * contexts produce the same bytes only when every field matches.
 */
export const buildEnvelopeAad = (context: Readonly<Record<string, string>>) =>
  Buffer.from(
    JSON.stringify(Object.keys(context).sort().map(key => [key, context[key]])),
    'utf8'
  );

export const encryptWithEnvelope = async ({
  plaintext,
  kms,
  aad
}: {
  plaintext: Buffer;
  kms: KeyManagementService;
  aad: Buffer;
}): Promise<CryptoResult<EnvelopeCiphertext>> => {
  if (plaintext.length === 0 || plaintext.length > MAX_PLAINTEXT_BYTES) {
    return err('invalid_input', `plaintext must be between 1 and ${MAX_PLAINTEXT_BYTES} bytes`);
  }

  const dataKey = randomBytes(DATA_KEY_BYTES);
  try {
    const iv = randomBytes(AES_GCM_IV_BYTES);
    const cipher = createCipheriv('aes-256-gcm', dataKey, iv);
    cipher.setAAD(aad);
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    const authTag = cipher.getAuthTag();

    let wrapped: WrappedDataKey;
    try {
      wrapped = await kms.wrapDataKey({data_key: dataKey, aad});
    } catch (failure) {
      return fromKmsFailure(failure, 'invalid_envelope_payload');
    }

    return ok(
      EnvelopeCiphertextSchema.parse({
        version: 1,
        content_encryption_alg: 'A256GCM',
        key_encryption_alg: 'A256GCMKW',
        key_id: wrapped.key_id,
        wrapped_data_key_b64: wrapped.wrapped_data_key.toString('base64'),
        iv_b64: iv.toString('base64'),
        ciphertext_b64: ciphertext.toString('base64'),
        auth_tag_b64: authTag.toString('base64'),
        aad_b64: aad.toString('base64')
      })
    );
  } finally {
    dataKey.fill(0);
  }
};

export const decryptWithEnvelope = async ({
  envelope,
  kms,
  expectedAad
}: {
  envelope: EnvelopeCiphertext;
  kms: KeyManagementService;
  expectedAad: Buffer;
}): Promise<CryptoResult<Buffer>> => {
  const parsed = EnvelopeCiphertextSchema.safeParse(envelope);
  if (!parsed.success) {
    return err('invalid_envelope_payload', parsed.error.issues.map(issue => issue.message).join('; '));
  }

  const iv = Buffer.from(parsed.data.iv_b64, 'base64');
  const authTag = Buffer.from(parsed.data.auth_tag_b64, 'base64');
  if (iv.length !== AES_GCM_IV_BYTES || authTag.length !== AES_GCM_TAG_BYTES) {
    return err('invalid_envelope_payload', 'iv or auth tag has invalid length');
  }

  const envelopeAad = Buffer.from(parsed.data.aad_b64 ?? '', 'base64');
  if (envelopeAad.length !== expectedAad.length || !timingSafeEqual(envelopeAad, expectedAad)) {
    return err('aad_mismatch', 'AAD does not match the expected context');
  }

  let dataKey: Buffer;
  try {
    dataKey = await kms.unwrapDataKey({
      key_id: parsed.data.key_id,
      wrapped_data_key: Buffer.from(parsed.data.wrapped_data_key_b64, 'base64'),
      aad: expectedAad
    });
  } catch (failure) {
    return fromKmsFailure(failure, 'kms_unwrap_failed');
  }

  try {
    const decipher = createDecipheriv('aes-256-gcm', dataKey, iv);
    decipher.setAAD(expectedAad);
    decipher.setAuthTag(authTag);
    return ok(Buffer.concat([decipher.update(Buffer.from(parsed.data.ciphertext_b64, 'base64')), decipher.final()]));
  } catch {
    return err('decrypt_auth_failed', 'Envelope decrypt failed authentication');
  } finally {
    dataKey.fill(0);
  }
};
