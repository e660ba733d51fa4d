export {EnvelopeCiphertextSchema, KeyIdSchema, KeyringInputSchema, type EnvelopeCiphertext, type KeyringInput} from './contracts.js';
export {buildEnvelopeAad, decryptWithEnvelope, encryptWithEnvelope} from './envelope.js';
export {
  cryptoErrorCodes,
  err,
  ok,
  type CryptoError,
  type CryptoErrorCode,
  type CryptoFailure,
  type CryptoResult,
  type CryptoSuccess
} from './errors.js';
export {createAesGcmKeyring, KeyManagementError, type KeyManagementService, type WrappedDataKey} from './keyring.js';
