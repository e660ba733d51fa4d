export const vaultErrorCodes = [
  'secret_key_invalid',
  'secret_not_found',
  'secret_encrypt_failed',
  'secret_decrypt_failed'
] as const

export type VaultErrorCode = (typeof vaultErrorCodes)[number]

export type VaultResult<T> = {ok: true; value: T} | {ok: false; error: {code: VaultErrorCode; message: string}}

export const ok = <T>(value: T): {ok: true; value: T} => ({ok: true, value})

export const err = (code: VaultErrorCode, message: string): {ok: false; error: {code: VaultErrorCode; message: string}} => ({
  ok: false,
  error: {code, message}
})
