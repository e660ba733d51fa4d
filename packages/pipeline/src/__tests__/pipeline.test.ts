import {readFile, readdir, rm, writeFile} from 'node:fs/promises'
import {join} from 'node:path'

import type {Invoker} from '@prefab-gateway/invoker'
import type {InterfaceSpec} from '@prefab-gateway/schemas'
import {afterEach, describe, expect, it, vi} from 'vitest'

import {ExecutionPipeline, summarizeJobStatus} from '../index'
import {createHarness, csvReportSpec, mailerSpec, textStatsSpec, wordCountSpec} from './harness'

const baseDirs: string[] = []

const harness = async (options: Parameters<typeof createHarness>[0]) => {
  const created = await createHarness(options)
  baseDirs.push(created.baseDir)
  return created
}

afterEach(async () => {
  await Promise.all(baseDirs.splice(0).map(dir => rm(dir, {recursive: true, force: true})))
})

/** A downstream stand-in that writes `report.txt` into the workspace it is given. */
const reportWriter: Invoker['call'] = async ({payload, headers}) => {
  const workspaceDir = headers?.['x-workspace-dir'] ?? ''
  const source = payload.inputs.source
  const content = typeof source === 'string' ? await readFile(source, 'utf8') : ''
  await writeFile(join(workspaceDir, 'report.txt'), `rows=${content.trim().split('\n').length}`)
  return {ok: true, value: {report: 'report.txt', rows: content.trim().split('\n').length}}
}

describe('execution pipeline', () => {
  it('runs a call without files or secrets and never opens a workspace', async () => {
    const h = await harness({
      specs: [textStatsSpec],
      invoke: () => Promise.resolve({ok: true, value: {words: 2}})
    })

    const job = await h.pipeline.execute({
      callerId: 'user-a',
      correlationId: 'corr-1',
      calls: [{service_id: 'text-stats', version: '1.0.0', inputs: {text: 'hello world'}}]
    })

    expect(job).toEqual({
      job_id: 'job-1',
      status: 'COMPLETED',
      results: [{call_index: 0, service_id: 'text-stats', version: '1.0.0', status: 'SUCCESS', output: {words: 2}}]
    })
    expect(h.invoker.call).toHaveBeenCalledTimes(1)
    const [request] = h.invoker.call.mock.calls[0] ?? []
    expect(request?.endpoint).toBe('http://text-stats.prefabs.test')
    expect(request?.payload).toEqual({inputs: {text: 'hello world'}, secrets: {}})
    expect(request?.headers).toEqual({
      'x-correlation-id': 'corr-1',
      'x-job-id': 'job-1',
      'x-call-index': '0'
    })
    expect(await readdir(h.workspaceRoot)).toEqual([])
  })

  it('fails with bad_request naming the missing secret and never invokes the service', async () => {
    const h = await harness({specs: [mailerSpec]})
    await h.vault.put({callerId: 'user-a', serviceId: 'mailer', name: 'SENDER', value: 'noreply@example.test'})

    const job = await h.pipeline.execute({
      callerId: 'user-a',
      correlationId: 'corr-1',
      calls: [{service_id: 'mailer', version: '2.0.0', inputs: {to: 'someone@example.test'}}]
    })

    expect(job.status).toBe('FAILED')
    expect(job.results).toEqual([
      {
        call_index: 0,
        service_id: 'mailer',
        version: '2.0.0',
        status: 'FAILURE',
        error: {
          kind: 'bad_request',
          code: 'secret_not_configured',
          message: 'Secret API_KEY is not configured for service mailer'
        }
      }
    ])
    expect(h.invoker.call).not.toHaveBeenCalled()
    expect(await readdir(h.workspaceRoot)).toEqual([])
  })

  it('passes each caller only their own secrets, beside the inputs', async () => {
    const h = await harness({specs: [mailerSpec]})
    for (const [callerId, suffix] of [
      ['user-a', 'a'],
      ['user-b', 'b']
    ] as const) {
      await h.vault.put({callerId, serviceId: 'mailer', name: 'API_KEY', value: `test-secret-${suffix}`})
      await h.vault.put({callerId, serviceId: 'mailer', name: 'SENDER', value: `sender-${suffix}`})
    }

    for (const callerId of ['user-a', 'user-b']) {
      await h.pipeline.execute({
        callerId,
        correlationId: 'corr',
        calls: [{service_id: 'mailer', version: '2.0.0', inputs: {to: 'x@example.test'}}]
      })
    }

    expect(h.invoker.call.mock.calls.map(([request]) => request.payload)).toEqual([
      {inputs: {to: 'x@example.test'}, secrets: {API_KEY: 'test-secret-a', SENDER: 'sender-a'}},
      {inputs: {to: 'x@example.test'}, secrets: {API_KEY: 'test-secret-b', SENDER: 'sender-b'}}
    ])
  })

  it('denies inputs the caller cannot read without transferring anything', async () => {
    const h = await harness({specs: [wordCountSpec]})
    const uri = await h.putObject({bucket: 'uploads', key: 'user-b/notes.txt', content: 'private'})
    await h.acl.grantOwnership({callerId: 'user-b', uri})
    const download = vi.spyOn(h.transfer, 'download')

    const job = await h.pipeline.execute({
      callerId: 'user-a',
      correlationId: 'corr',
      calls: [{service_id: 'word-count', version: '1.0.0', inputs: {document: uri}}]
    })

    expect(job.results[0]).toMatchObject({
      status: 'FAILURE',
      error: {kind: 'permission_denied', code: 'input_access_denied'}
    })
    expect(download).not.toHaveBeenCalled()
    expect(h.invoker.call).not.toHaveBeenCalled()
  })

  it('stages readable inputs into the workspace and sends their local paths', async () => {
    let seen = ''
    const h = await harness({
      specs: [wordCountSpec],
      invoke: async ({payload}) => {
        const document = payload.inputs.document
        seen = typeof document === 'string' ? document : ''
        return {ok: true, value: {words: (await readFile(seen, 'utf8')).split(' ').length}}
      }
    })
    const uri = await h.putObject({bucket: 'uploads', key: 'user-a/notes.txt', content: 'one two three'})
    await h.acl.grantOwnership({callerId: 'user-a', uri})

    const job = await h.pipeline.execute({
      callerId: 'user-a',
      correlationId: 'corr',
      calls: [{service_id: 'word-count', version: '1.0.0', inputs: {document: uri}}]
    })

    expect(job.results[0]).toMatchObject({status: 'SUCCESS', output: {words: 3}})
    expect(seen.startsWith(join(h.workspaceRoot, 'job-1', 'inputs'))).toBe(true)
    expect(seen.endsWith('-notes.txt')).toBe(true)
  })

  it('uploads outputs, grants ownership and feeds them to later calls', async () => {
    const h = await harness({
      specs: [csvReportSpec, wordCountSpec],
      invoke: async request => {
        if (request.endpoint === 'http://csv-report.prefabs.test') {
          return reportWriter(request)
        }
        const document = request.payload.inputs.document
        return {ok: true, value: {text: typeof document === 'string' ? await readFile(document, 'utf8') : ''}}
      }
    })
    const uri = await h.putObject({bucket: 'uploads', key: 'user-a/data.csv', content: 'a,b\n1,2\n3,4\n'})
    await h.acl.grantOwnership({callerId: 'user-a', uri})

    const job = await h.pipeline.execute({
      callerId: 'user-a',
      correlationId: 'corr',
      calls: [
        {service_id: 'csv-report', version: '1.0.0', inputs: {source: uri}},
        {service_id: 'word-count', version: '1.0.0', inputs: {document: {from_call: 0, output: 'report'}}}
      ]
    })

    const reportUri = 'local://outputs/results/2026/06/01/job-1/artifact-2.txt'
    expect(job.status).toBe('COMPLETED')
    expect(job.results.map(result => (result.status === 'SUCCESS' ? result.output : result.error))).toEqual([
      {report: reportUri, rows: 3},
      {text: 'rows=3'}
    ])
    expect(await h.acl.canRead({callerId: 'user-a', uri: reportUri})).toBe(true)
    expect(await h.acl.canRead({callerId: 'user-b', uri: reportUri})).toBe(false)
    expect(await readFile(join(h.storageRoot, 'outputs', 'results', '2026', '06', '01', 'job-1', 'artifact-2.txt'), 'utf8')).toBe(
      'rows=3'
    )
    expect(await readdir(h.workspaceRoot)).toEqual([])
  })

  it('rejects a reference to an output an earlier call did not produce', async () => {
    const h = await harness({
      specs: [csvReportSpec, wordCountSpec],
      invoke: () => Promise.resolve({ok: false, error: {code: 'downstream_error', message: 'boom', status: 500}})
    })
    const uri = await h.putObject({bucket: 'uploads', key: 'user-a/data.csv', content: 'a\n'})
    await h.acl.grantOwnership({callerId: 'user-a', uri})

    const job = await h.pipeline.execute({
      callerId: 'user-a',
      correlationId: 'corr',
      policy: 'continue',
      calls: [
        {service_id: 'csv-report', version: '1.0.0', inputs: {source: uri}},
        {service_id: 'word-count', version: '1.0.0', inputs: {document: {from_call: 0, output: 'report'}}}
      ]
    })

    expect(job.status).toBe('FAILED')
    expect(job.results.map(result => (result.status === 'FAILURE' ? result.error.code : 'ok'))).toEqual([
      'downstream_error',
      'output_reference_unavailable'
    ])
    expect(h.invoker.call).toHaveBeenCalledTimes(1)
  })

  it('does not offer outputs of a call that failed halfway through its uploads', async () => {
    const pairSpec: InterfaceSpec = {
      service_id: 'pair-writer',
      version: '1.0.0',
      parameters: [
        {name: 'first', type: 'file', required: true, file_direction: 'output'},
        {name: 'second', type: 'file', required: true, file_direction: 'output'}
      ],
      secrets: []
    }
    const h = await harness({
      specs: [pairSpec, wordCountSpec],
      invoke: async ({headers}) => {
        await writeFile(join(headers?.['x-workspace-dir'] ?? '', 'first.txt'), 'half done')
        return {ok: true, value: {first: 'first.txt'}}
      }
    })

    const job = await h.pipeline.execute({
      callerId: 'user-a',
      correlationId: 'corr',
      policy: 'continue',
      calls: [
        {service_id: 'pair-writer', version: '1.0.0', inputs: {}},
        {service_id: 'word-count', version: '1.0.0', inputs: {document: {from_call: 0, output: 'first'}}}
      ]
    })

    expect(job.results.map(result => (result.status === 'FAILURE' ? result.error : 'ok'))).toEqual([
      {kind: 'internal_error', code: 'output_missing', message: 'Service did not return required output second'},
      {
        kind: 'validation_error',
        code: 'output_reference_unavailable',
        message: 'parameter document references output first of call 0, which is not available'
      }
    ])
    expect(h.invoker.call).toHaveBeenCalledTimes(1)
  })

  it('stops at the first failure by default and keeps earlier results', async () => {
    const h = await harness({specs: [textStatsSpec], invoke: () => Promise.resolve({ok: true, value: {words: 1}})})

    const job = await h.pipeline.execute({
      callerId: 'user-a',
      correlationId: 'corr',
      calls: [
        {service_id: 'text-stats', version: '1.0.0', inputs: {text: 'a'}},
        {service_id: 'unknown-service', version: '1.0.0', inputs: {}},
        {service_id: 'text-stats', version: '1.0.0', inputs: {text: 'c'}}
      ]
    })

    expect(job.status).toBe('PARTIAL')
    expect(job.results).toHaveLength(2)
    expect(job.results[1]).toEqual({
      call_index: 1,
      service_id: 'unknown-service',
      version: '1.0.0',
      status: 'FAILURE',
      error: {kind: 'not_found', code: 'spec_not_found', message: 'No interface spec for unknown-service@1.0.0'}
    })
  })

  it('keeps going after a failure under the continue policy', async () => {
    const h = await harness({
      specs: [textStatsSpec],
      invoke: () => Promise.resolve({ok: true, value: {words: 1}}),
      settings: {continuationPolicy: 'continue'}
    })

    const job = await h.pipeline.execute({
      callerId: 'user-a',
      correlationId: 'corr',
      calls: [
        {service_id: 'text-stats', version: '1.0.0', inputs: {text: 'a'}},
        {service_id: 'text-stats', version: '1.0.0', inputs: {text: 7}},
        {service_id: 'text-stats', version: '1.0.0', inputs: {text: 'c'}}
      ]
    })

    expect(job.status).toBe('PARTIAL')
    expect(job.results.map(result => [result.call_index, result.status])).toEqual([
      [0, 'SUCCESS'],
      [1, 'FAILURE'],
      [2, 'SUCCESS']
    ])
  })

  it('reports every validation problem in one failure', async () => {
    const h = await harness({specs: [textStatsSpec, csvReportSpec]})

    const job = await h.pipeline.execute({
      callerId: 'user-a',
      correlationId: 'corr',
      policy: 'continue',
      calls: [
        {service_id: 'text-stats', version: '1.0.0', inputs: {top: 1.5, colour: 'red'}},
        {service_id: 'csv-report', version: '1.0.0', inputs: {source: 'local://b/k.csv', report: 'local://b/out'}}
      ]
    })

    expect(job.results.map(result => (result.status === 'FAILURE' ? result.error : null))).toEqual([
      {
        kind: 'validation_error',
        code: 'unknown_parameter',
        message:
          'parameter colour is not declared by text-stats@1.0.0; parameter text is required; parameter top must be integer, got number'
      },
      {
        kind: 'validation_error',
        code: 'output_parameter_supplied',
        message: 'parameter report is an output and must not be supplied'
      }
    ])
    expect(h.invoker.call).not.toHaveBeenCalled()
  })

  it('refuses outputs that point outside the workspace', async () => {
    const h = await harness({
      specs: [csvReportSpec],
      invoke: () => Promise.resolve({ok: true, value: {report: '../../etc/passwd'}})
    })
    const uri = await h.putObject({bucket: 'uploads', key: 'user-a/data.csv', content: 'a\n'})
    await h.acl.grantOwnership({callerId: 'user-a', uri})

    const job = await h.pipeline.execute({
      callerId: 'user-a',
      correlationId: 'corr',
      calls: [{service_id: 'csv-report', version: '1.0.0', inputs: {source: uri}}]
    })

    expect(job.results[0]).toMatchObject({error: {kind: 'internal_error', code: 'output_outside_workspace'}})
    expect(await readdir(h.workspaceRoot)).toEqual([])
  })

  it('fails when a required output is missing', async () => {
    const h = await harness({specs: [csvReportSpec], invoke: () => Promise.resolve({ok: true, value: {rows: 0}})})
    const uri = await h.putObject({bucket: 'uploads', key: 'user-a/data.csv', content: 'a\n'})
    await h.acl.grantOwnership({callerId: 'user-a', uri})

    const job = await h.pipeline.execute({
      callerId: 'user-a',
      correlationId: 'corr',
      calls: [{service_id: 'csv-report', version: '1.0.0', inputs: {source: uri}}]
    })

    expect(job.results[0]).toMatchObject({
      error: {kind: 'internal_error', code: 'output_missing', message: 'Service did not return required output report'}
    })
  })

  it('reports a failed ownership grant as an output storage failure', async () => {
    const h = await harness({specs: [csvReportSpec], invoke: reportWriter})
    const uri = await h.putObject({bucket: 'uploads', key: 'user-a/data.csv', content: 'a\n'})
    await h.acl.grantOwnership({callerId: 'user-a', uri})
    vi.spyOn(h.acl, 'grantOwnership').mockRejectedValueOnce(new Error('acl store offline'))

    const job = await h.pipeline.execute({
      callerId: 'user-a',
      correlationId: 'corr',
      calls: [{service_id: 'csv-report', version: '1.0.0', inputs: {source: uri}}]
    })

    expect(job.results[0]).toMatchObject({
      status: 'FAILURE',
      error: {kind: 'internal_error', code: 'output_upload_failed', message: 'Output report could not be stored'}
    })
    expect(await readdir(h.workspaceRoot)).toEqual([])
  })

  it('distinguishes a missing endpoint from a failing service', async () => {
    const noTemplate = await harness({specs: [textStatsSpec], urlTemplate: ''})
    const failing = await harness({
      specs: [textStatsSpec],
      invoke: () =>
        Promise.resolve({
          ok: false,
          error: {code: 'downstream_error', message: 'Downstream service responded with status 502', status: 502}
        })
    })
    const calls = [{service_id: 'text-stats', version: '1.0.0', inputs: {text: 'x'}}]

    const missing = await noTemplate.pipeline.execute({callerId: 'user-a', correlationId: 'corr', calls})
    const unavailable = await failing.pipeline.execute({callerId: 'user-a', correlationId: 'corr', calls})

    expect(missing.results[0]).toMatchObject({error: {kind: 'service_not_found', code: 'endpoint_not_found'}})
    expect(unavailable.results[0]).toMatchObject({
      error: {
        kind: 'service_unavailable',
        code: 'downstream_error',
        message: 'text-stats@1.0.0 failed: Downstream service responded with status 502'
      }
    })
    expect(noTemplate.invoker.call).not.toHaveBeenCalled()
  })

  it('cancels the in-flight call when the request runs out of time', async () => {
    const h = await harness({
      specs: [textStatsSpec],
      settings: {pipelineTimeoutMs: 20, continuationPolicy: 'continue'},
      invoke: ({signal}) =>
        new Promise(resolve => {
          signal?.addEventListener('abort', () =>
            resolve({ok: false, error: {code: 'invoke_aborted', message: 'Downstream call was cancelled'}})
          )
        })
    })

    const job = await h.pipeline.execute({
      callerId: 'user-a',
      correlationId: 'corr',
      calls: [
        {service_id: 'text-stats', version: '1.0.0', inputs: {text: 'a'}},
        {service_id: 'text-stats', version: '1.0.0', inputs: {text: 'b'}}
      ]
    })

    expect(job.results).toEqual([
      {
        call_index: 0,
        service_id: 'text-stats',
        version: '1.0.0',
        status: 'FAILURE',
        error: {kind: 'service_unavailable', code: 'pipeline_timeout', message: 'Request exceeded 20ms'}
      }
    ])
    expect(await readdir(h.workspaceRoot)).toEqual([])
  })

  it('times out a transfer that never settles and skips the call', async () => {
    const h = await harness({specs: [csvReportSpec], settings: {pipelineTimeoutMs: 50}, invoke: reportWriter})
    const uri = await h.putObject({bucket: 'uploads', key: 'user-a/data.csv', content: 'a\n'})
    await h.acl.grantOwnership({callerId: 'user-a', uri})
    let downloadSignal: AbortSignal | undefined
    vi.spyOn(h.transfer, 'download').mockImplementation(({signal}) => {
      downloadSignal = signal
      return new Promise<string>(() => {})
    })

    const job = await h.pipeline.execute({
      callerId: 'user-a',
      correlationId: 'corr',
      calls: [{service_id: 'csv-report', version: '1.0.0', inputs: {source: uri}}]
    })

    expect(job.results).toEqual([
      {
        call_index: 0,
        service_id: 'csv-report',
        version: '1.0.0',
        status: 'FAILURE',
        error: {kind: 'service_unavailable', code: 'pipeline_timeout', message: 'Request exceeded 50ms'}
      }
    ])
    expect(downloadSignal?.aborted).toBe(true)
    expect(h.invoker.call).not.toHaveBeenCalled()
    expect(await readdir(h.workspaceRoot)).toEqual([])
  })

  it('times out a spec lookup that never settles', async () => {
    const h = await harness({specs: [textStatsSpec], settings: {pipelineTimeoutMs: 30}})
    const pipeline = new ExecutionPipeline({
      dependencies: {
        specs: {get: () => new Promise<InterfaceSpec | null>(() => {})},
        vault: h.vault,
        acl: h.acl,
        workspaces: h.workspaces,
        transfer: h.transfer,
        endpoints: {resolve: () => Promise.resolve('http://unused')},
        invoker: h.invoker
      },
      settings: {continuationPolicy: 'abort', invokeTimeoutMs: 10, pipelineTimeoutMs: 30},
      generateId: () => 'job-stuck'
    })

    const job = await pipeline.execute({
      callerId: 'user-a',
      correlationId: 'corr',
      calls: [{service_id: 'text-stats', version: '1.0.0', inputs: {text: 'a'}}]
    })

    expect(job.status).toBe('FAILED')
    expect(job.results[0]).toMatchObject({
      error: {kind: 'service_unavailable', code: 'pipeline_timeout', message: 'Request exceeded 30ms'}
    })
    expect(h.invoker.call).not.toHaveBeenCalled()
  })

  it('turns unexpected faults into internal errors and still cleans up', async () => {
    const h = await harness({
      specs: [textStatsSpec],
      invoke: () => Promise.reject(new Error('invoker exploded'))
    })

    const job = await h.pipeline.execute({
      callerId: 'user-a',
      correlationId: 'corr',
      calls: [{service_id: 'text-stats', version: '1.0.0', inputs: {text: 'a'}}]
    })

    expect(job.results[0]).toMatchObject({
      error: {kind: 'internal_error', code: 'unexpected_error', message: 'Call failed unexpectedly'}
    })
    expect(await readdir(h.workspaceRoot)).toEqual([])
  })

  it('records one audit event per job', async () => {
    const h = await harness({specs: [textStatsSpec], invoke: () => Promise.resolve({ok: true, value: {}})})

    await h.pipeline.execute({
      callerId: 'user-a',
      correlationId: 'corr-9',
      calls: [{service_id: 'text-stats', version: '1.0.0', inputs: {text: 'a'}}]
    })

    const events = await h.audit.queryEvents({query: {action: 'job.executed'}})
    expect(events.ok && events.value.events.map(event => [event.caller_id, event.correlation_id, event.outcome])).toEqual([
      ['user-a', 'corr-9', 'success']
    ])
    expect(events.ok && events.value.events[0]?.metadata).toMatchObject({job_id: 'job-1', status: 'COMPLETED', call_count: 1})
  })

  it('fails the first call when no workspace can be opened', async () => {
    const thumbnailerSpec: InterfaceSpec = {
      service_id: 'thumbnailer',
      version: '1.0.0',
      parameters: [{name: 'thumbnail', type: 'file', required: true, file_direction: 'output'}],
      secrets: []
    }
    const h = await harness({specs: [thumbnailerSpec]})
    const pipeline = new ExecutionPipeline({
      dependencies: {
        specs: {get: () => Promise.resolve(thumbnailerSpec)},
        vault: h.vault,
        acl: h.acl,
        workspaces: {
          open: () => Promise.reject(new Error('read-only file system')),
          close: () => Promise.resolve(true)
        },
        transfer: h.transfer,
        endpoints: {resolve: () => Promise.resolve('http://unused')},
        invoker: h.invoker
      },
      settings: {continuationPolicy: 'abort', invokeTimeoutMs: 100, pipelineTimeoutMs: 1000},
      generateId: () => 'job-x'
    })

    const job = await pipeline.execute({
      callerId: 'user-a',
      correlationId: 'corr',
      calls: [{service_id: 'thumbnailer', version: '1.0.0', inputs: {}}]
    })

    expect(job).toEqual({
      job_id: 'job-x',
      status: 'FAILED',
      results: [
        {
          call_index: 0,
          service_id: 'thumbnailer',
          version: '1.0.0',
          status: 'FAILURE',
          error: {kind: 'internal_error', code: 'workspace_unavailable', message: 'Request workspace could not be created'}
        }
      ]
    })
    expect(h.invoker.call).not.toHaveBeenCalled()
  })
})

describe('job status', () => {
  const result = (status: 'SUCCESS' | 'FAILURE') =>
    status === 'SUCCESS'
      ? {call_index: 0, service_id: 's', version: '1', status, output: {}}
      : {call_index: 0, service_id: 's', version: '1', status, error: {kind: 'internal_error' as const, code: 'x', message: ''}}

  it('is completed only when every call succeeded', () => {
    expect(summarizeJobStatus([result('SUCCESS'), result('SUCCESS')])).toBe('COMPLETED')
    expect(summarizeJobStatus([result('SUCCESS'), result('FAILURE')])).toBe('PARTIAL')
    expect(summarizeJobStatus([result('FAILURE')])).toBe('FAILED')
  })
})
