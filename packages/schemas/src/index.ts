export * from './calls'
export * from './deployments'
export * from './identifiers'
export * from './interface-spec'
export * from './jobs'
export * from './observability'
export * from './secrets'
export * from './storage-uri'
