export const cryptoErrorCodes = [
  'invalid_input',
  'invalid_key_id',
  'invalid_key_length',
  'invalid_envelope_payload',
  'kms_key_not_found',
  'kms_unwrap_failed',
  'decrypt_auth_failed',
  'aad_mismatch'
] as const;

export type CryptoErrorCode = (typeof cryptoErrorCodes)[number];

export type CryptoError = {
  code: CryptoErrorCode;
  message: string;
};

export type CryptoSuccess<T> = {
  ok: true;
  value: T;
};

export type CryptoFailure = {
  ok: false;
  error: CryptoError;
};

export type CryptoResult<T> = CryptoSuccess<T> | CryptoFailure;

export const ok = <T>(value: T): CryptoSuccess<T> => ({ok: true, value});

export const err = (code: CryptoErrorCode, message: string): CryptoFailure => ({
  ok: false,
  error: {code, message}
});
