export {createInMemorySpecCache, createRedisSpecCache} from './caches'
export {
  specCacheKey,
  SpecSourceError,
  type FetchLike,
  type InterfaceSpecSource,
  type SpecCache,
  type SpecCacheRedisClient,
  type SpecCoordinates
} from './contracts'
export {createHttpSpecSource} from './http-source'
export {InterfaceSpecStore, type InterfaceSpecStoreOptions} from './store'
