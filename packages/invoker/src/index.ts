export {
  DEFAULT_INVOKER_LIMITS,
  DownstreamResponseSchema,
  InvokePayloadSchema,
  type DownstreamResponse,
  type EndpointCoordinates,
  type FetchLike,
  type InvokePayload,
  type InvokeRequest,
  type KeyValueClient
} from './contracts';
export {
  err,
  invokerErrorCodes,
  ok,
  type InvokerError,
  type InvokerErrorCode,
  type InvokerFailure,
  type InvokerResult,
  type InvokerSuccess
} from './errors';
export {createInvoker, isConnectionError, type Invoker} from './invoker';
export {
  createEndpointRegistry,
  createInMemoryDeploymentStore,
  createInMemoryWebhookEventStore,
  createRedisDeploymentStore,
  createRedisWebhookEventStore,
  type DeploymentStore,
  type EndpointRegistry,
  type WebhookEventStore
} from './registry';
