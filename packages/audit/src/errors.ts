export const auditErrorCodes = [
  'invalid_input',
  'invalid_search_query',
  'invalid_time_range',
  'storage_write_failed',
  'storage_query_failed'
] as const

export type AuditErrorCode = (typeof auditErrorCodes)[number]

export type AuditError = {code: AuditErrorCode; message: string}

export type AuditResult<T> = {ok: true; value: T} | {ok: false; error: AuditError}

export const ok = <T>(value: T): AuditResult<T> => ({ok: true, value})

export const err = <T = never>(code: AuditErrorCode, message: string): AuditResult<T> => ({
  ok: false,
  error: {code, message}
})

/** Store messages stay internal: the HTTP layer answers storage failures with its own text. */
export const storeFailure = <T = never>(
  code: Extract<AuditErrorCode, `storage_${string}`>,
  error: unknown
): AuditResult<T> => err(code, error instanceof Error ? error.message : 'Unexpected error')
