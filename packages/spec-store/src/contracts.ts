import type {InterfaceSpec} from '@prefab-gateway/schemas'

export type FetchLike = (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>

export type SpecCoordinates = {
  serviceId: string
  version: string
}

/** The external contract store the cache reads through to. */
export type InterfaceSpecSource = {
  fetch: (coordinates: SpecCoordinates) => Promise<InterfaceSpec | null>
}

export type SpecCache = {
  get: (key: string) => Promise<InterfaceSpec | null>
  /** Without ttlSeconds the entry does not expire. */
  set: (key: string, spec: InterfaceSpec, ttlSeconds?: number) => Promise<void>
  delete: (key: string) => Promise<void>
}

export type SpecCacheRedisClient = {
  get: (key: string) => Promise<string | null>
  set: (key: string, value: string, options?: {EX?: number}) => Promise<void>
  del: (key: string) => Promise<number>
}

export class SpecSourceError extends Error {
  public readonly code: 'spec_source_unavailable' | 'spec_source_invalid'

  public constructor(code: SpecSourceError['code'], message: string) {
    super(message)
    this.name = 'SpecSourceError'
    this.code = code
  }
}

export const specCacheKey = ({serviceId, version}: SpecCoordinates) => `spec:${serviceId}:${version}`
