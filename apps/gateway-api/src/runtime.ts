import {createInMemoryAccessControl, createRedisAccessControl, type AccessControl} from '@prefab-gateway/access-control'
import {createAuditService, createInMemoryAuditStore, type AuditService} from '@prefab-gateway/audit'
import {createAesGcmKeyring} from '@prefab-gateway/crypto'
import {
  createEndpointRegistry,
  createInMemoryDeploymentStore,
  createInMemoryWebhookEventStore,
  createInvoker,
  createRedisDeploymentStore,
  createRedisWebhookEventStore,
  type EndpointRegistry,
  type FetchLike,
  type WebhookEventStore
} from '@prefab-gateway/invoker'
import type {StructuredLogger} from '@prefab-gateway/logging'
import {
  createLocalStorageBackend,
  createObjectTransfer,
  createS3Client,
  createS3StorageBackend,
  toS3ObjectClient,
  type StorageBackend
} from '@prefab-gateway/object-transfer'
import {ExecutionPipeline} from '@prefab-gateway/pipeline'
import {
  createInMemorySecretRecordStore,
  createRedisSecretRecordStore,
  createSecretVault,
  type SecretVault
} from '@prefab-gateway/secret-vault'
import {
  createHttpSpecSource,
  createInMemorySpecCache,
  createRedisSpecCache,
  InterfaceSpecStore
} from '@prefab-gateway/spec-store'
import {createWorkspaceSweeper, WorkspaceManager, type WorkspaceSweeper} from '@prefab-gateway/workspace'

import type {ServiceConfig, StorageConfig} from './config'
import {createDeploymentWebhookProcessor, type DeploymentWebhookProcessor} from './deployments'
import type {ProcessInfrastructure} from './infrastructure'

const SPEC_SOURCE_TIMEOUT_MS = 5_000

export type GatewayRuntime = {
  pipeline: ExecutionPipeline
  vault: SecretVault
  acl: AccessControl
  specs: InterfaceSpecStore
  workspaces: WorkspaceManager
  sweeper: WorkspaceSweeper
  endpoints: EndpointRegistry
  webhookEvents: WebhookEventStore
  webhooks: DeploymentWebhookProcessor
  audit: AuditService
}

const createStorageBackend = (storage: StorageConfig): StorageBackend =>
  storage.backend === 'local'
    ? createLocalStorageBackend({root: storage.root})
    : createS3StorageBackend({
        client: toS3ObjectClient(
          createS3Client({
            region: storage.region,
            ...(storage.endpoint ? {endpoint: storage.endpoint} : {}),
            forcePathStyle: storage.forcePathStyle
          })
        )
      })

/** Builds every component from configuration; redis-backed stores are used when redis is connected. */
export const createGatewayRuntime = ({
  config,
  infrastructure,
  logger,
  fetchImpl,
  storageBackend
}: {
  config: ServiceConfig
  infrastructure: ProcessInfrastructure
  logger: StructuredLogger
  fetchImpl?: FetchLike
  storageBackend?: StorageBackend
}): GatewayRuntime => {
  const redis = infrastructure.redis

  const keyring = createAesGcmKeyring({
    active_key_id: config.secrets.activeKeyId,
    keys: config.secrets.keys
  })
  if (!keyring.ok) {
    throw new Error(`Secret keyring could not be created: ${keyring.error.message}`)
  }

  const vault = createSecretVault({
    kms: keyring.value,
    store: redis
      ? createRedisSecretRecordStore({client: redis.secrets, keyPrefix: redis.keyPrefix})
      : createInMemorySecretRecordStore(),
    logger
  })

  const acl = redis
    ? createRedisAccessControl({client: redis.acl, keyPrefix: redis.keyPrefix, logger})
    : createInMemoryAccessControl({logger})

  const specs = new InterfaceSpecStore({
    cache: redis
      ? createRedisSpecCache({client: redis.specCache, keyPrefix: redis.keyPrefix, logger})
      : createInMemorySpecCache(),
    ...(config.specs.sourceUrl
      ? {
          source: createHttpSpecSource({
            baseUrl: config.specs.sourceUrl,
            timeoutMs: SPEC_SOURCE_TIMEOUT_MS,
            ...(fetchImpl ? {fetchImpl} : {})
          })
        }
      : {}),
    ttlSeconds: config.specs.cacheTtlSeconds,
    logger
  })

  const workspaces = new WorkspaceManager({root: config.workspace.root, logger})
  const sweeper = createWorkspaceSweeper({
    manager: workspaces,
    maxAgeMs: config.workspace.maxAgeSeconds * 1000,
    intervalMs: config.workspace.sweepIntervalSeconds * 1000,
    ...(config.workspace.diskWarnBytes !== undefined ? {diskWarnBytes: config.workspace.diskWarnBytes} : {}),
    logger
  })

  const backend = storageBackend ?? createStorageBackend(config.storage)
  const transfer = createObjectTransfer({
    backends: [backend],
    output: {
      scheme: backend.scheme,
      bucket: config.transfer.outputBucket,
      prefix: config.transfer.outputPrefix
    },
    retry: {
      maxAttempts: config.transfer.maxAttempts,
      backoffMs: config.transfer.backoffMs
    },
    logger
  })

  const endpoints = createEndpointRegistry({
    store: redis
      ? createRedisDeploymentStore({client: redis.keyValue, keyPrefix: redis.keyPrefix})
      : createInMemoryDeploymentStore(),
    ...(config.endpointUrlTemplate ? {urlTemplate: config.endpointUrlTemplate} : {})
  })
  const webhookEvents = redis
    ? createRedisWebhookEventStore({client: redis.keyValue, keyPrefix: redis.keyPrefix})
    : createInMemoryWebhookEventStore()

  // audit persistence stays outside the gateway; events are kept in process
  const audit = createAuditService({store: createInMemoryAuditStore()})

  const pipeline = new ExecutionPipeline({
    dependencies: {
      specs,
      vault,
      acl,
      workspaces,
      transfer,
      endpoints,
      invoker: createInvoker({...(fetchImpl ? {fetchImpl} : {}), logger}),
      audit,
      logger
    },
    settings: {
      continuationPolicy: config.pipeline.continuationPolicy,
      invokeTimeoutMs: config.pipeline.invokeTimeoutMs,
      pipelineTimeoutMs: config.pipeline.pipelineTimeoutMs
    }
  })

  return {
    pipeline,
    vault,
    acl,
    specs,
    workspaces,
    sweeper,
    endpoints,
    webhookEvents,
    webhooks: createDeploymentWebhookProcessor({registry: endpoints, events: webhookEvents, specs, audit, logger}),
    audit
  }
}
