export const invokerErrorCodes = [
  'invoke_timeout',
  'invoke_aborted',
  'connection_failed',
  'downstream_error',
  'downstream_response_too_large',
  'invalid_downstream_response'
] as const;

export type InvokerErrorCode = (typeof invokerErrorCodes)[number];

export type InvokerError = {
  code: InvokerErrorCode;
  message: string;
  status?: number;
};

export type InvokerSuccess<T> = {ok: true; value: T};
export type InvokerFailure = {ok: false; error: InvokerError};
export type InvokerResult<T> = InvokerSuccess<T> | InvokerFailure;

export const ok = <T>(value: T): InvokerSuccess<T> => ({ok: true, value});

export const err = (code: InvokerErrorCode, message: string, status?: number): InvokerFailure => ({
  ok: false,
  error: status === undefined ? {code, message} : {code, message, status}
});
