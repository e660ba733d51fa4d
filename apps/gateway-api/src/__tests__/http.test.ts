import {IncomingMessage} from 'node:http'
import {Socket} from 'node:net'

import {z} from 'zod'
import {describe, expect, it} from 'vitest'

import {AppError} from '../errors'
import {createProcessInfrastructure} from '../infrastructure'
import {loadConfig} from '../config'
import {decodePathParam, extractCorrelationId, parseJsonBody, parseJsonBuffer, parseQuery} from '../http'

const makeRequest = ({headers = {}, body}: {headers?: Record<string, string>; body?: string} = {}) => {
  const request = new IncomingMessage(new Socket())
  request.headers = headers
  if (body !== undefined) {
    request.push(body)
  }
  request.push(null)
  request.complete = true
  return request
}

const captureError = async (action: () => unknown): Promise<unknown> => {
  try {
    await action()
  } catch (error) {
    return error
  }
  return null
}

const schema = z.object({name: z.string()}).strict()

describe('gateway-api http helpers', () => {
  it('keeps a sane caller correlation id and replaces anything else', () => {
    expect(extractCorrelationId(makeRequest({headers: {'x-correlation-id': '  corr-1  '}}))).toBe('corr-1')
    expect(extractCorrelationId(makeRequest({headers: {'x-correlation-id': 'x'.repeat(129)}}))).toMatch(
      /^[0-9a-f-]{36}$/u
    )
    expect(extractCorrelationId(makeRequest())).toMatch(/^[0-9a-f-]{36}$/u)
  })

  it('parses a JSON body against a schema', async () => {
    const request = makeRequest({
      headers: {'content-type': 'application/json; charset=utf-8'},
      body: JSON.stringify({name: 'text-stats'})
    })

    await expect(parseJsonBody({request, schema, maxBodyBytes: 1024})).resolves.toEqual({name: 'text-stats'})
  })

  it('rejects bodies that are too large or of the wrong type', async () => {
    const tooLarge = await captureError(() =>
      parseJsonBody({
        request: makeRequest({headers: {'content-type': 'application/json'}, body: JSON.stringify({name: 'x'.repeat(64)})}),
        schema,
        maxBodyBytes: 16
      })
    )
    const wrongType = await captureError(() =>
      parseJsonBody({request: makeRequest({headers: {'content-type': 'text/plain'}, body: '{}'}), schema, maxBodyBytes: 16})
    )

    expect(tooLarge).toBeInstanceOf(AppError)
    expect(tooLarge).toMatchObject({status: 400, code: 'request_body_too_large', message: 'Request body exceeds 16 bytes'})
    expect(wrongType).toMatchObject({status: 415, code: 'content_type_invalid'})
  })

  it('distinguishes empty, malformed and mismatched JSON', async () => {
    expect(await captureError(() => parseJsonBuffer({raw: Buffer.alloc(0), schema}))).toMatchObject({
      code: 'request_body_missing'
    })
    expect(await captureError(() => parseJsonBuffer({raw: Buffer.from('{'), schema}))).toMatchObject({
      code: 'request_body_invalid_json'
    })
    expect(await captureError(() => parseJsonBuffer({raw: Buffer.from('{"name":1,"extra":true}'), schema}))).toMatchObject({
      status: 400,
      code: 'request_body_schema_invalid'
    })
  })

  it('validates query strings and path parameters', async () => {
    const querySchema = z.object({limit: z.coerce.number().int().positive()}).strict()

    expect(parseQuery({searchParams: new URLSearchParams('limit=5'), schema: querySchema})).toEqual({limit: 5})
    expect(await captureError(() => parseQuery({searchParams: new URLSearchParams('limit=0'), schema: querySchema}))).toMatchObject({
      status: 400,
      code: 'query_invalid'
    })
    expect(decodePathParam('text%20stats')).toBe('text stats')
    expect(await captureError(() => decodePathParam('%E0%A4%A'))).toMatchObject({
      status: 400,
      code: 'path_param_invalid',
      message: 'Path parameter encoding is invalid'
    })
  })
})

describe('process infrastructure', () => {
  it('stays disabled without a redis url', async () => {
    const infrastructure = await createProcessInfrastructure({config: loadConfig({NODE_ENV: 'test'})})

    expect(infrastructure.enabled).toBe(false)
    expect(infrastructure.redis).toBeNull()
    await expect(infrastructure.close()).resolves.toBeUndefined()
  })
})
