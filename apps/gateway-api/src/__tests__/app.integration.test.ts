import {mkdtemp, rm} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'

import type {FetchLike} from '@prefab-gateway/invoker'
import {JobSchema, type InterfaceSpec} from '@prefab-gateway/schemas'
import {SignJWT} from 'jose'
import {afterEach, beforeEach, describe, expect, it, vi, type Mock} from 'vitest'

import {createGatewayApp, type GatewayApp} from '../app'
import {loadConfig} from '../config'
import {signWebhookBody} from '../deployments'

const jwtSecret = new TextEncoder().encode('test-secret')
const webhookSecret = 'test-webhook-secret'

const textStatsSpec: InterfaceSpec = {
  service_id: 'text-stats',
  version: '1.0.0',
  parameters: [{name: 'text', type: 'string', required: true}],
  secrets: []
}

const mailerSpec: InterfaceSpec = {
  service_id: 'mailer',
  version: '2.0.0',
  parameters: [{name: 'to', type: 'string', required: true}],
  secrets: [{name: 'API_KEY'}, {name: 'SENDER'}]
}

const signToken = (subject: string, scopes: string) =>
  new SignJWT({scopes})
    .setProtectedHeader({alg: 'HS256'})
    .setSubject(subject)
    .setAudience('prefab-gateway')
    .setIssuedAt()
    .setExpirationTime('5m')
    .sign(jwtSecret)

const jsonResponse = (body: unknown) =>
  new Response(JSON.stringify(body), {status: 200, headers: {'content-type': 'application/json'}})

let app: GatewayApp | null = null
let baseDir = ''
let baseUrl = ''
let downstream: Mock<FetchLike>

const send = async ({
  method = 'GET',
  path,
  token,
  body,
  headers = {}
}: {
  method?: string
  path: string
  token?: string
  body?: unknown
  headers?: Record<string, string>
}) => {
  const response = await fetch(`${baseUrl}${path}`, {
    method,
    headers: {
      ...(token ? {authorization: `Bearer ${token}`} : {}),
      ...(body !== undefined ? {'content-type': 'application/json'} : {}),
      ...headers
    },
    ...(body !== undefined ? {body: typeof body === 'string' ? body : JSON.stringify(body)} : {})
  })

  const text = await response.text()
  const json: unknown = text.length > 0 ? JSON.parse(text) : null
  return {status: response.status, headers: response.headers, body: json}
}

const publishSpec = async (spec: InterfaceSpec) => {
  const published = await send({
    method: 'PUT',
    path: `/v1/services/${spec.service_id}/${spec.version}/spec`,
    token: await signToken('operator', 'admin'),
    body: spec
  })
  expect(published.status).toBe(204)
}

beforeEach(async () => {
  baseDir = await mkdtemp(join(tmpdir(), 'gateway-api-test-'))
  downstream = vi.fn<FetchLike>(() => Promise.resolve(jsonResponse({words: 2})))

  const config = {
    ...loadConfig({
      NODE_ENV: 'test',
      GATEWAY_JWT_SECRET: 'test-secret',
      GATEWAY_WEBHOOK_SECRET: webhookSecret,
      GATEWAY_STORAGE_BACKEND: 'local',
      GATEWAY_STORAGE_LOCAL_ROOT: join(baseDir, 'storage'),
      GATEWAY_WORKSPACE_ROOT: join(baseDir, 'workspaces'),
      GATEWAY_ENDPOINT_URL_TEMPLATE: 'http://{service_id}.prefabs.test'
    }),
    host: '127.0.0.1',
    port: 0
  }

  app = await createGatewayApp({config, fetchImpl: downstream})
  await app.start()

  const address = app.server.address()
  if (!address || typeof address === 'string') {
    throw new Error('Gateway is not listening on a TCP port')
  }
  baseUrl = `http://127.0.0.1:${String(address.port)}`
})

afterEach(async () => {
  await app?.stop()
  app = null
  await rm(baseDir, {recursive: true, force: true})
})

describe('gateway-api', () => {
  it('answers health checks without a token', async () => {
    const response = await send({path: '/healthz', headers: {'x-correlation-id': 'corr-health'}})

    expect(response.status).toBe(200)
    expect(response.body).toEqual({status: 'ok'})
    expect(response.headers.get('x-correlation-id')).toBe('corr-health')
    expect(response.headers.get('x-content-type-options')).toBe('nosniff')
  })

  it('reports readiness once the workspace root exists', async () => {
    const response = await send({path: '/readyz'})

    expect(response.status).toBe(200)
    expect(response.body).toEqual({status: 'ready', policy: 'abort'})
  })

  it('rejects callers without a token or without the scope', async () => {
    const call = {calls: [{service_id: 'text-stats', version: '1.0.0', inputs: {text: 'hi'}}]}

    const anonymous = await send({
      method: 'POST',
      path: '/v1/run',
      body: call,
      headers: {'x-correlation-id': 'corr-auth'}
    })
    const readOnly = await send({
      method: 'POST',
      path: '/v1/run',
      token: await signToken('caller-1', 'prefab:read'),
      body: call
    })

    expect(anonymous.status).toBe(401)
    expect(anonymous.body).toEqual({
      error: 'unauthenticated',
      message: 'Missing bearer token',
      correlation_id: 'corr-auth'
    })
    expect(readOnly.status).toBe(403)
    expect(readOnly.body).toMatchObject({
      error: 'permission_denied',
      message: 'Token lacks the prefab:execute scope'
    })
    expect(downstream).not.toHaveBeenCalled()
  })

  it('runs a call against a published spec', async () => {
    await publishSpec(textStatsSpec)

    const spec = await send({
      path: '/v1/services/text-stats/1.0.0/spec',
      token: await signToken('caller-1', 'prefab:read')
    })
    expect(spec.status).toBe(200)
    expect(spec.body).toEqual(textStatsSpec)

    const run = await send({
      method: 'POST',
      path: '/v1/run',
      token: await signToken('caller-1', 'prefab:execute'),
      body: {calls: [{service_id: 'text-stats', version: '1.0.0', inputs: {text: 'hello world'}}]}
    })

    expect(run.status).toBe(200)
    const job = JobSchema.parse(run.body)
    expect(run.headers.get('x-job-id')).toBe(job.job_id)
    expect(job).toEqual({
      job_id: job.job_id,
      status: 'COMPLETED',
      results: [{call_index: 0, service_id: 'text-stats', version: '1.0.0', status: 'SUCCESS', output: {words: 2}}]
    })

    expect(downstream).toHaveBeenCalledTimes(1)
    const [url, init] = downstream.mock.calls[0] ?? []
    expect(String(url)).toBe('http://text-stats.prefabs.test/invoke')
    expect(JSON.parse(String(init?.body))).toEqual({inputs: {text: 'hello world'}, secrets: {}})
  })

  it('answers a lone failed call with the status of its error kind', async () => {
    const run = await send({
      method: 'POST',
      path: '/v1/run',
      token: await signToken('caller-1', 'prefab:execute'),
      body: {calls: [{service_id: 'unknown-service', version: '1.0.0', inputs: {}}]}
    })

    expect(run.status).toBe(404)
    expect(run.body).toMatchObject({
      status: 'FAILED',
      results: [
        {
          call_index: 0,
          service_id: 'unknown-service',
          version: '1.0.0',
          status: 'FAILURE',
          error: {kind: 'not_found', code: 'spec_not_found', message: 'No interface spec for unknown-service@1.0.0'}
        }
      ]
    })
  })

  it('answers 200 when one of several calls fails', async () => {
    await publishSpec(textStatsSpec)

    const run = await send({
      method: 'POST',
      path: '/v1/run',
      token: await signToken('caller-1', 'prefab:execute'),
      body: {
        calls: [
          {service_id: 'text-stats', version: '1.0.0', inputs: {text: 'hello'}},
          {service_id: 'unknown-service', version: '1.0.0', inputs: {}}
        ]
      }
    })

    expect(run.status).toBe(200)
    expect(run.body).toMatchObject({status: 'PARTIAL'})
  })

  it('rejects malformed run requests before executing anything', async () => {
    const token = await signToken('caller-1', 'prefab:execute')

    const empty = await send({method: 'POST', path: '/v1/run', token, body: {calls: []}})
    const notJson = await send({
      method: 'POST',
      path: '/v1/run',
      token,
      body: 'calls=1',
      headers: {'content-type': 'text/plain'}
    })

    expect(empty.status).toBe(400)
    expect(empty.body).toMatchObject({error: 'request_body_schema_invalid'})
    expect(notJson.status).toBe(415)
    expect(notJson.body).toMatchObject({error: 'content_type_invalid', message: 'Content-Type must be application/json'})
    expect(downstream).not.toHaveBeenCalled()
  })

  it('rejects a spec whose body names other coordinates', async () => {
    const response = await send({
      method: 'PUT',
      path: '/v1/services/text-stats/2.0.0/spec',
      token: await signToken('operator', 'admin'),
      body: textStatsSpec
    })
    const missing = await send({
      path: '/v1/services/text-stats/9.9.9/spec',
      token: await signToken('caller-1', 'prefab:read')
    })

    expect(response.status).toBe(422)
    expect(response.body).toMatchObject({error: 'spec_coordinates_mismatch'})
    expect(missing.status).toBe(404)
    expect(missing.body).toMatchObject({error: 'spec_not_found', message: 'No interface spec for text-stats@9.9.9'})
  })

  it('stores, lists and deletes caller secrets', async () => {
    const token = await signToken('caller-1', 'secrets:manage')

    const written = await send({
      method: 'POST',
      path: '/v1/secrets',
      token,
      body: {service_id: 'mailer', secret_name: 'API_KEY', secret_value: 'test-secret'}
    })
    expect(written.status).toBe(204)

    const listed = await send({path: '/v1/secrets/mailer', token})
    expect(listed.status).toBe(200)
    expect(listed.body).toEqual({
      service_id: 'mailer',
      secrets: [{name: 'API_KEY', created_at: expect.any(String), updated_at: expect.any(String), last_used_at: null}]
    })

    const otherCaller = await send({path: '/v1/secrets/mailer', token: await signToken('caller-2', 'secrets:manage')})
    expect(otherCaller.body).toEqual({service_id: 'mailer', secrets: []})

    const removed = await send({method: 'DELETE', path: '/v1/secrets/mailer/API_KEY', token})
    const removedAgain = await send({method: 'DELETE', path: '/v1/secrets/mailer/API_KEY', token})
    const invalidService = await send({path: '/v1/secrets/Not_A_Label', token})

    expect(removed.status).toBe(204)
    expect(removedAgain.status).toBe(404)
    expect(removedAgain.body).toMatchObject({
      error: 'secret_not_found',
      message: "Secret 'API_KEY' is not configured for service 'mailer'"
    })
    expect(invalidService.status).toBe(400)
    expect(invalidService.body).toMatchObject({error: 'path_param_invalid'})
  })

  it('passes the caller secrets to the downstream service', async () => {
    await publishSpec(mailerSpec)
    const token = await signToken('caller-1', 'prefab:execute secrets:manage')
    for (const [name, value] of [
      ['API_KEY', 'test-secret'],
      ['SENDER', 'noreply@example.test']
    ]) {
      const written = await send({
        method: 'POST',
        path: '/v1/secrets',
        token,
        body: {service_id: 'mailer', secret_name: name, secret_value: value}
      })
      expect(written.status).toBe(204)
    }

    const run = await send({
      method: 'POST',
      path: '/v1/run',
      token,
      body: {calls: [{service_id: 'mailer', version: '2.0.0', inputs: {to: 'someone@example.test'}}]}
    })

    expect(run.status).toBe(200)
    const [url, init] = downstream.mock.calls[0] ?? []
    expect(String(url)).toBe('http://mailer.prefabs.test/invoke')
    expect(JSON.parse(String(init?.body))).toEqual({
      inputs: {to: 'someone@example.test'},
      secrets: {API_KEY: 'test-secret', SENDER: 'noreply@example.test'}
    })
  })

  it('applies signed deployment webhooks once', async () => {
    const rawBody = JSON.stringify({
      event_id: 'evt-1',
      event_type: 'deployment.succeeded',
      service_id: 'text-stats',
      version: '1.0.0',
      endpoint_url: 'http://10.0.0.7:8080',
      occurred_at: '2026-06-01T08:00:00.000Z'
    })
    const signature = signWebhookBody({secret: webhookSecret, rawBody: Buffer.from(rawBody)})

    const unsigned = await send({
      method: 'POST',
      path: '/webhooks/deployments',
      body: rawBody,
      headers: {'x-webhook-signature': signWebhookBody({secret: 'other-secret', rawBody: Buffer.from(rawBody)})}
    })
    expect(unsigned.status).toBe(401)
    expect(unsigned.body).toMatchObject({error: 'webhook_signature_invalid', message: 'Webhook signature does not match'})

    const processed = await send({
      method: 'POST',
      path: '/webhooks/deployments',
      body: rawBody,
      headers: {'x-webhook-signature': signature}
    })
    expect(processed.status).toBe(200)
    expect(processed.body).toEqual({
      status: 'processed',
      deployment: {
        service_id: 'text-stats',
        version: '1.0.0',
        status: 'deployed',
        endpoint_url: 'http://10.0.0.7:8080',
        updated_at: expect.any(String)
      }
    })

    const replayed = await send({
      method: 'POST',
      path: '/webhooks/deployments',
      body: rawBody,
      headers: {'x-webhook-signature': signature}
    })
    expect(replayed.body).toEqual({status: 'duplicate'})

    const adminToken = await signToken('operator', 'admin')
    const record = await send({path: '/webhooks/events/evt-1', token: adminToken})
    const unknown = await send({path: '/webhooks/events/evt-404', token: adminToken})
    expect(record.body).toEqual({
      event_id: 'evt-1',
      event_type: 'deployment.succeeded',
      status: 'processed',
      received_at: expect.any(String)
    })
    expect(unknown.status).toBe(404)
    expect(unknown.body).toMatchObject({error: 'webhook_event_not_found', message: 'No webhook event evt-404'})

    await publishSpec(textStatsSpec)
    await send({
      method: 'POST',
      path: '/v1/run',
      token: await signToken('caller-1', 'prefab:execute'),
      body: {calls: [{service_id: 'text-stats', version: '1.0.0', inputs: {text: 'hi'}}]}
    })
    const [url] = downstream.mock.calls[0] ?? []
    expect(String(url)).toBe('http://10.0.0.7:8080/invoke')
  })

  it('lists only the files the caller owns', async () => {
    await app?.runtime.acl.grantOwnership({callerId: 'caller-1', uri: 's3://prefab-uploads/caller-1/data.csv'})

    const owner = await send({path: '/v1/files', token: await signToken('caller-1', 'prefab:read')})
    const stranger = await send({path: '/v1/files', token: await signToken('caller-2', 'prefab:read')})

    expect(owner.body).toEqual({uris: ['s3://prefab-uploads/caller-1/data.csv']})
    expect(stranger.body).toEqual({uris: []})
  })

  it('exposes audit events to admins only', async () => {
    await publishSpec(textStatsSpec)
    await send({
      method: 'POST',
      path: '/v1/run',
      token: await signToken('caller-1', 'prefab:execute'),
      body: {calls: [{service_id: 'text-stats', version: '1.0.0', inputs: {text: 'hi'}}]}
    })

    const adminToken = await signToken('operator', 'admin')
    const events = await send({path: '/v1/audit/events?action=job.executed', token: adminToken})
    const invalid = await send({path: '/v1/audit/events?action=everything', token: adminToken})
    const denied = await send({path: '/v1/audit/events', token: await signToken('caller-1', 'prefab:read')})

    expect(events.status).toBe(200)
    expect(events.body).toMatchObject({
      events: [
        {
          action: 'job.executed',
          caller_id: 'caller-1',
          outcome: 'success',
          metadata: {status: 'COMPLETED', call_count: 1}
        }
      ]
    })
    expect(invalid.status).toBe(400)
    expect(invalid.body).toMatchObject({error: 'invalid_search_query'})
    expect(denied.status).toBe(403)
  })

  it('answers unknown routes with a JSON 404', async () => {
    const response = await send({path: '/v2/unknown', headers: {'x-correlation-id': 'corr-missing'}})

    expect(response.status).toBe(404)
    expect(response.body).toEqual({
      error: 'route_not_found',
      message: 'No route for GET /v2/unknown',
      correlation_id: 'corr-missing'
    })
  })
})
