import {z} from 'zod';

export type FetchLike = (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>;

export const DEFAULT_INVOKER_LIMITS = {
  max_response_bytes: 10 * 1024 * 1024,
  connect_retry_delay_ms: 100
} as const;

/** Body of `POST {endpoint}/invoke`. Secrets stay a sibling of inputs. */
export const InvokePayloadSchema = z
  .object({
    inputs: z.record(z.string(), z.unknown()),
    secrets: z.record(z.string(), z.string())
  })
  .strict();

export type InvokePayload = z.infer<typeof InvokePayloadSchema>;

export const DownstreamResponseSchema = z.record(z.string(), z.unknown());
export type DownstreamResponse = z.infer<typeof DownstreamResponseSchema>;

export type InvokeRequest = {
  endpoint: string;
  payload: InvokePayload;
  timeoutMs: number;
  headers?: Record<string, string>;
  signal?: AbortSignal;
};

export type EndpointCoordinates = {
  serviceId: string;
  version: string;
};

export type KeyValueClient = {
  get: (key: string) => Promise<string | null>;
  /** With `NX` the write only happens when the key is absent; resolves to whether it was written. */
  set: (key: string, value: string, options?: {NX?: boolean}) => Promise<boolean>;
};
