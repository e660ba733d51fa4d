import {mkdir, mkdtemp, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'

import {createInMemoryAccessControl} from '@prefab-gateway/access-control'
import {createAuditService, createInMemoryAuditStore} from '@prefab-gateway/audit'
import {createAesGcmKeyring} from '@prefab-gateway/crypto'
import {createEndpointRegistry, createInMemoryDeploymentStore, type Invoker} from '@prefab-gateway/invoker'
import {createLocalStorageBackend, createObjectTransfer} from '@prefab-gateway/object-transfer'
import type {InterfaceSpec} from '@prefab-gateway/schemas'
import {SecretVault} from '@prefab-gateway/secret-vault'
import {createInMemorySpecCache, InterfaceSpecStore} from '@prefab-gateway/spec-store'
import {WorkspaceManager} from '@prefab-gateway/workspace'
import {vi} from 'vitest'

import {ExecutionPipeline, type PipelineSettings} from '../index'

const createKms = () => {
  const keyring = createAesGcmKeyring({active_key_id: 'v1', keys: {v1: Buffer.alloc(32, 3).toString('base64')}})
  if (!keyring.ok) {
    throw new Error(keyring.error.message)
  }
  return keyring.value
}

export const createHarness = async ({
  specs = [],
  invoke,
  settings,
  urlTemplate = 'http://{service_id}.prefabs.test'
}: {
  specs?: InterfaceSpec[]
  invoke?: Invoker['call']
  settings?: Partial<PipelineSettings>
  urlTemplate?: string
}) => {
  const baseDir = await mkdtemp(join(tmpdir(), 'pipeline-test-'))
  const workspaceRoot = join(baseDir, 'workspaces')
  const storageRoot = join(baseDir, 'storage')
  await mkdir(workspaceRoot, {recursive: true})

  const specStore = new InterfaceSpecStore({cache: createInMemorySpecCache(), ttlSeconds: 60})
  for (const spec of specs) {
    await specStore.publish(spec)
  }

  const vault = new SecretVault({kms: createKms()})
  const acl = createInMemoryAccessControl()
  const workspaces = new WorkspaceManager({root: workspaceRoot})
  let artifactCount = 0
  const transfer = createObjectTransfer({
    backends: [createLocalStorageBackend({root: storageRoot})],
    output: {scheme: 'local', bucket: 'outputs', prefix: 'results'},
    retry: {maxAttempts: 1, backoffMs: 0},
    now: () => new Date('2026-06-01T08:00:00.000Z'),
    generateId: () => `artifact-${++artifactCount}`
  })
  const endpoints = createEndpointRegistry({store: createInMemoryDeploymentStore(), urlTemplate})
  const invoker = {
    call: vi.fn<Invoker['call']>(invoke ?? (() => Promise.resolve({ok: true, value: {}})))
  }
  const auditStore = createInMemoryAuditStore()
  const audit = createAuditService({store: auditStore})

  let jobCount = 0
  const pipeline = new ExecutionPipeline({
    dependencies: {specs: specStore, vault, acl, workspaces, transfer, endpoints, invoker, audit},
    settings: {continuationPolicy: 'abort', invokeTimeoutMs: 1000, pipelineTimeoutMs: 5000, ...settings},
    generateId: () => `job-${++jobCount}`
  })

  /** Places an object in local storage and returns its URI. */
  const putObject = async ({bucket, key, content}: {bucket: string; key: string; content: string}) => {
    const path = join(storageRoot, bucket, key)
    await mkdir(join(path, '..'), {recursive: true})
    await writeFile(path, content)
    return `local://${bucket}/${key}`
  }

  return {baseDir, workspaceRoot, storageRoot, pipeline, vault, acl, transfer, invoker, workspaces, audit, putObject}
}

export const textStatsSpec: InterfaceSpec = {
  service_id: 'text-stats',
  version: '1.0.0',
  parameters: [
    {name: 'text', type: 'string', required: true},
    {name: 'top', type: 'integer', required: false}
  ],
  secrets: []
}

export const mailerSpec: InterfaceSpec = {
  service_id: 'mailer',
  version: '2.0.0',
  parameters: [{name: 'to', type: 'string', required: true}],
  secrets: [{name: 'API_KEY'}, {name: 'SENDER'}]
}

export const csvReportSpec: InterfaceSpec = {
  service_id: 'csv-report',
  version: '1.0.0',
  parameters: [
    {name: 'source', type: 'file', required: true, file_direction: 'input'},
    {name: 'report', type: 'file', required: true, file_direction: 'output'}
  ],
  secrets: []
}

export const wordCountSpec: InterfaceSpec = {
  service_id: 'word-count',
  version: '1.0.0',
  parameters: [{name: 'document', type: 'file', required: true, file_direction: 'input'}],
  secrets: []
}
