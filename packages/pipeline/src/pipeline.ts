import {randomUUID} from 'node:crypto'
import {access, stat} from 'node:fs/promises'
import {resolve, sep} from 'node:path'

import {isTransferError, type TransferError} from '@prefab-gateway/object-transfer'
import {createNoopLogger, setLogContextFields, type StructuredLogger} from '@prefab-gateway/logging'
import type {CallRequest, CallResult, ContinuationPolicy, InterfaceSpec, Job, JobStatus} from '@prefab-gateway/schemas'
import {SpecSourceError} from '@prefab-gateway/spec-store'
import type {Workspace} from '@prefab-gateway/workspace'

import type {ExecuteRequest, PipelineDependencies, PipelineSettings} from './contracts'
import {isPipelineError, pipelineError, type PipelineError} from './errors'
import {validateCallInputs, type FileInput} from './validation'

type JobState = {
  jobId: string
  callerId: string
  correlationId: string
  /** Opened by the first call that moves files. */
  workspace: Workspace | null
  signal: AbortSignal
  /** Local paths of the output files each successful call left in the workspace. */
  producedOutputs: Map<number, Map<string, string>>
}

const isInside = (root: string, candidate: string) => candidate.startsWith(`${root}${sep}`)

/**
 * Settles with `operation`, or rejects with `onAbort()` as soon as `signal`
 * aborts. A rejection that arrives after the abort is reported as the abort.
 * The operation itself keeps running; collaborators that accept a signal stop
 * on their own.
 */
const untilAborted = <T>(signal: AbortSignal, operation: Promise<T>, onAbort: () => Error): Promise<T> =>
  new Promise<T>((resolvePromise, rejectPromise) => {
    const abort = () => rejectPromise(onAbort())
    void operation.then(
      value => {
        signal.removeEventListener('abort', abort)
        resolvePromise(value)
      },
      (error: unknown) => {
        signal.removeEventListener('abort', abort)
        rejectPromise(signal.aborted ? onAbort() : error)
      }
    )
    if (signal.aborted) {
      abort()
      return
    }
    signal.addEventListener('abort', abort, {once: true})
  })

export const summarizeJobStatus = (results: CallResult[]): JobStatus => {
  const succeeded = results.filter(result => result.status === 'SUCCESS').length
  if (succeeded === results.length) {
    return 'COMPLETED'
  }
  return succeeded === 0 ? 'FAILED' : 'PARTIAL'
}

const fromTransferError = (error: TransferError, name: string, direction: 'input' | 'output'): PipelineError => {
  if (error.code === 'transient') {
    return pipelineError('service_unavailable', 'storage_unavailable', `Object storage is unavailable for ${direction} ${name}`)
  }

  if (direction === 'output') {
    return pipelineError('internal_error', 'output_upload_failed', `Output ${name} could not be stored`)
  }

  switch (error.code) {
    case 'object_not_found':
      return pipelineError('not_found', 'input_object_not_found', `Input object for ${name} does not exist`)
    case 'access_denied':
      return pipelineError('permission_denied', 'input_access_denied', `Input object for ${name} is not readable`)
    case 'invalid_uri':
    case 'unsupported_scheme':
      return pipelineError('validation_error', 'invalid_file_reference', `Input ${name}: ${error.message}`)
    default:
      return pipelineError('internal_error', 'input_transfer_failed', `Input object for ${name} could not be staged`)
  }
}

/**
 * Runs the calls of one request in order against a single shared workspace.
 * Each call goes through spec lookup, validation, access checks, secret
 * resolution, staging, invocation and output collection. The workspace is
 * opened by the first call with a file parameter and closed on every exit path.
 */
export class ExecutionPipeline {
  private readonly dependencies: PipelineDependencies
  private readonly settings: PipelineSettings
  private readonly logger: StructuredLogger
  private readonly generateId: () => string

  public constructor({
    dependencies,
    settings,
    generateId
  }: {
    dependencies: PipelineDependencies
    settings: PipelineSettings
    generateId?: () => string
  }) {
    this.dependencies = dependencies
    this.settings = settings
    this.logger = dependencies.logger ?? createNoopLogger()
    this.generateId = generateId ?? randomUUID
  }

  public async execute({callerId, correlationId, calls, policy}: ExecuteRequest): Promise<Job> {
    const jobId = this.generateId()
    const continuation: ContinuationPolicy = policy ?? this.settings.continuationPolicy
    const startedAt = Date.now()
    const results: CallResult[] = []
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), this.settings.pipelineTimeoutMs)
    setLogContextFields({job_id: jobId, caller_id: callerId})

    const state: JobState = {
      jobId,
      callerId,
      correlationId,
      workspace: null,
      signal: controller.signal,
      producedOutputs: new Map()
    }

    try {
      for (const [index, call] of calls.entries()) {
        const result = await this.executeCall({state, call, index})
        results.push(result)
        if (result.status === 'FAILURE' && (continuation === 'abort' || controller.signal.aborted)) {
          break
        }
      }
    } finally {
      clearTimeout(timer)
      if (state.workspace) {
        await this.dependencies.workspaces.close(state.workspace)
      }
    }

    const job: Job = {job_id: jobId, status: summarizeJobStatus(results), results}
    const durationMs = Date.now() - startedAt
    this.logger.info({
      event: 'job.completed',
      component: 'pipeline',
      job_id: jobId,
      caller_id: callerId,
      duration_ms: durationMs,
      metadata: {status: job.status, call_count: calls.length, executed_count: results.length, policy: continuation}
    })
    await this.recordAudit({job, callerId, correlationId, durationMs, callCount: calls.length})
    return job
  }

  private async executeCall({state, call, index}: {state: JobState; call: CallRequest; index: number}) {
    const startedAt = Date.now()
    const logFields = {component: 'pipeline', job_id: state.jobId, service_id: call.service_id, call_index: index}
    this.logger.debug({...logFields, event: 'call.started', metadata: {version: call.version}})

    try {
      const output = await this.runCall({state, call, index})
      this.logger.info({
        ...logFields,
        event: 'call.succeeded',
        duration_ms: Date.now() - startedAt,
        metadata: {version: call.version}
      })
      return this.success({index, call, output})
    } catch (error) {
      const failure = this.toPipelineError(error, state.signal)
      this.logger.warn({
        ...logFields,
        event: 'call.failed',
        message: failure.message,
        reason_code: failure.code,
        duration_ms: Date.now() - startedAt,
        metadata: {version: call.version, kind: failure.kind, ...(isPipelineError(error) ? {} : {error})}
      })
      return this.failure({index, call, error: failure})
    }
  }

  private async runCall({state, call, index}: {state: JobState; call: CallRequest; index: number}) {
    const coordinates = {serviceId: call.service_id, version: call.version}
    this.throwIfAborted(state.signal)

    const spec = await this.fetchSpec(state, coordinates)

    const validated = validateCallInputs({spec, inputs: call.inputs, callIndex: index})
    if (!validated.ok) {
      throw validated.error
    }
    const {values, fileInputs, outputs} = validated.value
    const referencedPaths = await this.resolveCallOutputReferences({state, fileInputs})

    await this.checkReadAccess({state, fileInputs})

    const secrets = new Map<string, string>()
    try {
      await this.resolveSecrets({state, spec, secrets})

      const endpoint = await this.guard(state.signal, this.dependencies.endpoints.resolve(coordinates))
      if (!endpoint) {
        throw pipelineError(
          'service_not_found',
          'endpoint_not_found',
          `No live endpoint for ${call.service_id}@${call.version}`
        )
      }

      const workspace = fileInputs.length > 0 || outputs.length > 0 ? await this.ensureWorkspace(state) : null
      const stagedPaths = workspace ? await this.stageInputs({state, workspace, fileInputs}) : []
      this.throwIfAborted(state.signal)

      const response = await this.dependencies.invoker.call({
        endpoint,
        payload: {
          inputs: {...values, ...Object.fromEntries(referencedPaths), ...Object.fromEntries(stagedPaths)},
          secrets: Object.fromEntries(secrets)
        },
        timeoutMs: this.settings.invokeTimeoutMs,
        headers: {
          'x-correlation-id': state.correlationId,
          'x-job-id': state.jobId,
          'x-call-index': String(index),
          ...(workspace ? {'x-workspace-dir': workspace.path} : {})
        },
        signal: state.signal
      })
      secrets.clear()

      if (!response.ok) {
        const {code, message} = response.error
        if (code === 'invoke_aborted') {
          throw this.timeoutError()
        }
        throw pipelineError('service_unavailable', code, `${call.service_id}@${call.version} failed: ${message}`)
      }

      return await this.collectOutputs({state, workspace, index, outputs, response: response.value})
    } finally {
      secrets.clear()
    }
  }

  private async fetchSpec(
    state: JobState,
    coordinates: {serviceId: string; version: string}
  ): Promise<InterfaceSpec> {
    let spec: InterfaceSpec | null
    try {
      spec = await this.guard(state.signal, this.dependencies.specs.get(coordinates))
    } catch (error) {
      if (error instanceof SpecSourceError) {
        throw pipelineError('service_unavailable', 'spec_source_unavailable', error.message)
      }
      throw error
    }

    if (!spec) {
      throw pipelineError(
        'not_found',
        'spec_not_found',
        `No interface spec for ${coordinates.serviceId}@${coordinates.version}`
      )
    }
    return spec
  }

  private async resolveCallOutputReferences({state, fileInputs}: {state: JobState; fileInputs: FileInput[]}) {
    const resolved: Array<[string, string]> = []
    for (const {name, source} of fileInputs) {
      if (source.kind !== 'call_output') {
        continue
      }

      const {from_call: fromCall, output} = source.reference
      const localPath = state.producedOutputs.get(fromCall)?.get(output)
      const available = localPath !== undefined && (await access(localPath).then(() => true, () => false))
      if (!localPath || !available) {
        throw pipelineError(
          'validation_error',
          'output_reference_unavailable',
          `parameter ${name} references output ${output} of call ${fromCall}, which is not available`
        )
      }
      resolved.push([name, localPath])
    }
    return resolved
  }

  private async checkReadAccess({state, fileInputs}: {state: JobState; fileInputs: FileInput[]}) {
    for (const {name, source} of fileInputs) {
      if (source.kind !== 'uri') {
        continue
      }
      const readable = await this.guard(
        state.signal,
        this.dependencies.acl.canRead({callerId: state.callerId, uri: source.uri})
      )
      if (!readable) {
        throw pipelineError('permission_denied', 'input_access_denied', `Caller may not read the object given for ${name}`)
      }
    }
  }

  /** Every declared secret is looked up before anything is invoked. */
  private async resolveSecrets({
    state,
    spec,
    secrets
  }: {
    state: JobState
    spec: InterfaceSpec
    secrets: Map<string, string>
  }) {
    const missing: string[] = []
    for (const {name} of spec.secrets) {
      const result = await this.guard(
        state.signal,
        this.dependencies.vault.get({callerId: state.callerId, serviceId: spec.service_id, name})
      )
      if (result.ok) {
        secrets.set(name, result.value)
        continue
      }
      if (result.error.code !== 'secret_not_found') {
        throw pipelineError('internal_error', 'secret_unavailable', `Secret ${name} could not be resolved`)
      }
      missing.push(name)
    }

    if (missing.length > 0) {
      throw pipelineError(
        'bad_request',
        'secret_not_configured',
        `Secret ${missing.join(', ')} is not configured for service ${spec.service_id}`
      )
    }
  }

  private async ensureWorkspace(state: JobState): Promise<Workspace> {
    if (state.workspace) {
      return state.workspace
    }

    const opening = this.dependencies.workspaces.open(state.jobId)
    try {
      state.workspace = await this.guard(state.signal, opening)
    } catch (error) {
      if (isPipelineError(error)) {
        void opening.then(
          workspace => this.dependencies.workspaces.close(workspace),
          (openError: unknown) => {
            this.logger.warn({
              event: 'job.workspace.failed',
              component: 'pipeline',
              message: 'Workspace open failed after the request timed out',
              job_id: state.jobId,
              metadata: {error: openError}
            })
          }
        )
        throw error
      }
      this.logger.error({
        event: 'job.workspace.failed',
        component: 'pipeline',
        message: 'Workspace could not be opened',
        job_id: state.jobId,
        metadata: {error}
      })
      throw pipelineError('internal_error', 'workspace_unavailable', 'Request workspace could not be created')
    }
    return state.workspace
  }

  private async stageInputs({
    state,
    workspace,
    fileInputs
  }: {
    state: JobState
    workspace: Workspace
    fileInputs: FileInput[]
  }) {
    const staged: Array<[string, string]> = []
    for (const {name, source} of fileInputs) {
      if (source.kind !== 'uri') {
        continue
      }
      try {
        const localPath = await this.guard(
          state.signal,
          this.dependencies.transfer.download({uri: source.uri, destDir: workspace.path, signal: state.signal})
        )
        staged.push([name, localPath])
      } catch (error) {
        if (isTransferError(error)) {
          throw fromTransferError(error, name, 'input')
        }
        throw error
      }
    }
    return staged
  }

  /**
   * Uploads each declared output the service produced, grants the caller
   * ownership and swaps the local path for the durable URI.
   */
  private async collectOutputs({
    state,
    workspace,
    index,
    outputs,
    response
  }: {
    state: JobState
    workspace: Workspace | null
    index: number
    outputs: InterfaceSpec['parameters']
    response: Record<string, unknown>
  }) {
    const result: Record<string, unknown> = {...response}
    const produced = new Map<string, string>()
    if (!workspace) {
      state.producedOutputs.set(index, produced)
      return result
    }

    for (const parameter of outputs) {
      const value = response[parameter.name]
      if (value === undefined || value === null) {
        if (parameter.required) {
          throw pipelineError('internal_error', 'output_missing', `Service did not return required output ${parameter.name}`)
        }
        continue
      }

      if (typeof value !== 'string' || value.length === 0) {
        throw pipelineError('internal_error', 'output_invalid', `Output ${parameter.name} must be a workspace path`)
      }

      const localPath = resolve(workspace.path, value)
      if (!isInside(workspace.path, localPath)) {
        throw pipelineError(
          'internal_error',
          'output_outside_workspace',
          `Output ${parameter.name} points outside the request workspace`
        )
      }

      const isFile = await stat(localPath).then(info => info.isFile(), () => false)
      if (!isFile) {
        throw pipelineError('internal_error', 'output_missing', `Output file for ${parameter.name} was not produced`)
      }

      let uri: string
      try {
        uri = await this.guard(
          state.signal,
          this.dependencies.transfer.upload({localPath, keyHint: {requestId: state.jobId}, signal: state.signal})
        )
      } catch (error) {
        if (isTransferError(error)) {
          throw fromTransferError(error, parameter.name, 'output')
        }
        throw error
      }

      await this.grantOutputOwnership({state, name: parameter.name, uri})
      result[parameter.name] = uri
      produced.set(parameter.name, localPath)
    }

    // only a call that delivered every output can be referenced later
    state.producedOutputs.set(index, produced)
    return result
  }

  private async grantOutputOwnership({state, name, uri}: {state: JobState; name: string; uri: string}) {
    try {
      await this.guard(state.signal, this.dependencies.acl.grantOwnership({callerId: state.callerId, uri}))
    } catch (error) {
      if (isPipelineError(error)) {
        throw error
      }
      this.logger.error({
        event: 'output.ownership.failed',
        component: 'pipeline',
        message: 'Uploaded output could not be granted to the caller',
        job_id: state.jobId,
        metadata: {output: name, uri, error}
      })
      throw pipelineError('internal_error', 'output_upload_failed', `Output ${name} could not be stored`)
    }
  }

  private guard<T>(signal: AbortSignal, operation: Promise<T>): Promise<T> {
    return untilAborted(signal, operation, () => this.timeoutError())
  }

  private throwIfAborted(signal: AbortSignal) {
    if (signal.aborted) {
      throw this.timeoutError()
    }
  }

  private timeoutError() {
    return pipelineError(
      'service_unavailable',
      'pipeline_timeout',
      `Request exceeded ${this.settings.pipelineTimeoutMs}ms`
    )
  }

  private toPipelineError(error: unknown, signal: AbortSignal): PipelineError {
    if (isPipelineError(error)) {
      return error
    }
    if (signal.aborted) {
      return this.timeoutError()
    }
    return pipelineError('internal_error', 'unexpected_error', 'Call failed unexpectedly')
  }

  private success({index, call, output}: {index: number; call: CallRequest; output: Record<string, unknown>}): CallResult {
    return {call_index: index, service_id: call.service_id, version: call.version, status: 'SUCCESS', output}
  }

  private failure({index, call, error}: {index: number; call: CallRequest; error: PipelineError}): CallResult {
    return {
      call_index: index,
      service_id: call.service_id,
      version: call.version,
      status: 'FAILURE',
      error: error.toCallError()
    }
  }

  private async recordAudit({
    job,
    callerId,
    correlationId,
    durationMs,
    callCount
  }: {
    job: Job
    callerId: string
    correlationId: string
    durationMs: number
    callCount: number
  }) {
    if (!this.dependencies.audit) {
      return
    }

    const recorded = await this.dependencies.audit.recordEvent({
      input: {
        action: 'job.executed',
        caller_id: callerId,
        correlation_id: correlationId,
        outcome: job.status === 'COMPLETED' ? 'success' : 'failure',
        metadata: {job_id: job.job_id, status: job.status, call_count: callCount, duration_ms: durationMs}
      }
    })
    if (!recorded.ok) {
      this.logger.warn({
        event: 'audit.write.failed',
        component: 'pipeline',
        job_id: job.job_id,
        reason_code: recorded.error.code,
        message: recorded.error.message
      })
    }
  }
}
