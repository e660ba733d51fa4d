import {abortedTransfer, TransferError, isTransferError} from './errors'

export type RetryPolicy = {
  maxAttempts: number
  backoffMs: number
  sleep?: (ms: number) => Promise<void>
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

/**
 * Runs `operation` until it succeeds, fails permanently, or the attempts run
 * out. Only TransferErrors marked retryable are retried; the delay doubles
 * after each attempt. Once `signal` aborts, no further attempt starts and the
 * failure is reported as `transfer_aborted`.
 */
export const withTransferRetry = async <T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  onRetry?: (input: {attempt: number; error: TransferError; delayMs: number}) => void,
  signal?: AbortSignal
): Promise<T> => {
  const sleep = policy.sleep ?? defaultSleep
  for (let attempt = 1; ; attempt += 1) {
    if (signal?.aborted) {
      throw abortedTransfer(signal.reason)
    }
    try {
      return await operation(attempt)
    } catch (error) {
      if (signal?.aborted) {
        throw abortedTransfer(error)
      }
      const transferError = isTransferError(error)
        ? error
        : new TransferError({code: 'transfer_failed', message: 'Unexpected storage failure', cause: error})
      if (!transferError.retryable || attempt >= policy.maxAttempts) {
        throw transferError
      }

      const delayMs = policy.backoffMs * 2 ** (attempt - 1)
      onRetry?.({attempt, error: transferError, delayMs})
      await sleep(delayMs)
    }
  }
}
