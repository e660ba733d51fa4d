import {InterfaceSpecSchema} from '@prefab-gateway/schemas'

import {SpecSourceError, type FetchLike, type InterfaceSpecSource} from './contracts'

export const createHttpSpecSource = ({
  baseUrl,
  timeoutMs,
  fetchImpl = fetch
}: {
  baseUrl: string
  timeoutMs: number
  fetchImpl?: FetchLike
}): InterfaceSpecSource => ({
  fetch: async ({serviceId, version}) => {
    const url = new URL(
      `services/${encodeURIComponent(serviceId)}/${encodeURIComponent(version)}/spec`,
      baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`
    )

    let response: Response
    try {
      response = await fetchImpl(url, {
        method: 'GET',
        headers: {accept: 'application/json'},
        signal: AbortSignal.timeout(timeoutMs)
      })
    } catch (error) {
      throw new SpecSourceError(
        'spec_source_unavailable',
        `Contract store request failed: ${error instanceof Error ? error.message : 'unknown error'}`
      )
    }

    if (response.status === 404) {
      return null
    }

    if (!response.ok) {
      throw new SpecSourceError('spec_source_unavailable', `Contract store responded with status ${response.status}`)
    }

    let body: unknown
    try {
      body = await response.json()
    } catch {
      throw new SpecSourceError('spec_source_invalid', 'Contract store returned invalid JSON')
    }

    const parsed = InterfaceSpecSchema.safeParse(body)
    if (!parsed.success) {
      throw new SpecSourceError('spec_source_invalid', parsed.error.issues.map(issue => issue.message).join('; '))
    }

    if (parsed.data.service_id !== serviceId || parsed.data.version !== version) {
      throw new SpecSourceError('spec_source_invalid', 'Contract store returned a spec for different coordinates')
    }

    return parsed.data
  }
})
