import type {AccessControl} from '@prefab-gateway/access-control'
import type {AuditService} from '@prefab-gateway/audit'
import type {EndpointRegistry, Invoker} from '@prefab-gateway/invoker'
import type {StructuredLogger} from '@prefab-gateway/logging'
import type {ObjectTransfer} from '@prefab-gateway/object-transfer'
import type {CallRequest, ContinuationPolicy} from '@prefab-gateway/schemas'
import type {SecretVault} from '@prefab-gateway/secret-vault'
import type {InterfaceSpecStore} from '@prefab-gateway/spec-store'
import type {WorkspaceManager} from '@prefab-gateway/workspace'

export type PipelineDependencies = {
  specs: Pick<InterfaceSpecStore, 'get'>
  vault: Pick<SecretVault, 'get'>
  acl: Pick<AccessControl, 'canRead' | 'grantOwnership'>
  workspaces: Pick<WorkspaceManager, 'open' | 'close'>
  transfer: ObjectTransfer
  endpoints: Pick<EndpointRegistry, 'resolve'>
  invoker: Invoker
  audit?: Pick<AuditService, 'recordEvent'>
  logger?: StructuredLogger
}

export type PipelineSettings = {
  continuationPolicy: ContinuationPolicy
  invokeTimeoutMs: number
  pipelineTimeoutMs: number
}

export type ExecuteRequest = {
  callerId: string
  correlationId: string
  calls: CallRequest[]
  /** Overrides the configured continuation policy for this request. */
  policy?: ContinuationPolicy
}
