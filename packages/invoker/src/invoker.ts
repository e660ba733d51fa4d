import {createNoopLogger, type StructuredLogger} from '@prefab-gateway/logging';

import {
  DEFAULT_INVOKER_LIMITS,
  DownstreamResponseSchema,
  type DownstreamResponse,
  type FetchLike,
  type InvokeRequest
} from './contracts';
import {err, ok, type InvokerResult} from './errors';

// failures that happen before the request reaches the service, so a retry cannot run it twice
const CONNECT_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_CONNECT_TIMEOUT'
]);

const readCode = (value: unknown) =>
  typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string'
    ? value.code
    : undefined;

const readCause = (value: unknown) =>
  typeof value === 'object' && value !== null && 'cause' in value ? value.cause : undefined;

export const isConnectionError = (error: unknown) => {
  let current: unknown = error;
  for (let depth = 0; depth < 4 && current !== undefined; depth += 1) {
    const code = readCode(current);
    if (code && CONNECT_ERROR_CODES.has(code)) {
      return true;
    }
    current = readCause(current);
  }
  return false;
};

const invokeUrl = (endpoint: string) => new URL('invoke', endpoint.endsWith('/') ? endpoint : `${endpoint}/`);

const readBodyWithLimit = async ({
  response,
  maxResponseBytes
}: {
  response: Response;
  maxResponseBytes: number;
}): Promise<InvokerResult<string>> => {
  const contentLengthHeader = response.headers.get('content-length');
  if (contentLengthHeader && /^\d+$/u.test(contentLengthHeader.trim())) {
    const contentLength = Number.parseInt(contentLengthHeader, 10);
    if (Number.isSafeInteger(contentLength) && contentLength > maxResponseBytes) {
      return err('downstream_response_too_large', `Downstream response exceeds ${maxResponseBytes} bytes`);
    }
  }

  if (!response.body) {
    return ok('');
  }

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let totalBytes = 0;
  while (true) {
    const readResult = await reader.read();
    if (readResult.done) {
      break;
    }

    const chunk: Uint8Array = readResult.value;
    totalBytes += chunk.byteLength;
    if (totalBytes > maxResponseBytes) {
      await reader.cancel();
      return err('downstream_response_too_large', `Downstream response exceeds ${maxResponseBytes} bytes`);
    }
    chunks.push(chunk);
  }

  return ok(Buffer.concat(chunks, totalBytes).toString('utf8'));
};

const parseDownstreamBody = (text: string): InvokerResult<DownstreamResponse> => {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch {
    return err('invalid_downstream_response', 'Downstream response is not valid JSON');
  }

  const parsed = DownstreamResponseSchema.safeParse(decoded);
  if (!parsed.success) {
    return err('invalid_downstream_response', 'Downstream response must be a JSON object');
  }

  return ok(parsed.data);
};

export type Invoker = {
  call: (request: InvokeRequest) => Promise<InvokerResult<DownstreamResponse>>;
};

export const createInvoker = ({
  fetchImpl = fetch,
  logger = createNoopLogger(),
  maxResponseBytes = DEFAULT_INVOKER_LIMITS.max_response_bytes,
  connectRetryDelayMs = DEFAULT_INVOKER_LIMITS.connect_retry_delay_ms,
  sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))
}: {
  fetchImpl?: FetchLike;
  logger?: StructuredLogger;
  maxResponseBytes?: number;
  connectRetryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
} = {}): Invoker => {
  const attempt = async ({
    endpoint,
    payload,
    timeoutMs,
    headers,
    signal
  }: InvokeRequest): Promise<InvokerResult<DownstreamResponse>> => {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, {once: true});
    if (signal?.aborted) {
      controller.abort();
    }

    try {
      const response = await fetchImpl(invokeUrl(endpoint), {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          accept: 'application/json',
          ...headers
        },
        body: JSON.stringify(payload),
        redirect: 'manual',
        signal: controller.signal
      });

      const body = await readBodyWithLimit({response, maxResponseBytes});
      if (!body.ok) {
        return body;
      }

      if (response.status < 200 || response.status >= 300) {
        return err('downstream_error', `Downstream service responded with status ${response.status}`, response.status);
      }

      return parseDownstreamBody(body.value);
    } catch (error) {
      if (timedOut) {
        return err('invoke_timeout', `Downstream call exceeded ${timeoutMs}ms`);
      }
      if (signal?.aborted) {
        return err('invoke_aborted', 'Downstream call was cancelled');
      }
      if (isConnectionError(error)) {
        return err('connection_failed', 'Could not connect to the downstream service');
      }
      return err('downstream_error', error instanceof Error ? error.message : 'Downstream call failed');
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  };

  return {
    call: async request => {
      const first = await attempt(request);
      if (first.ok || first.error.code !== 'connection_failed' || request.signal?.aborted) {
        return first;
      }

      logger.warn({
        event: 'invoker.connect.retry',
        component: 'invoker',
        message: 'Connection to downstream service failed, retrying once',
        reason_code: first.error.code,
        metadata: {endpoint: request.endpoint}
      });
      await sleep(connectRetryDelayMs);

      return attempt(request);
    }
  };
};
