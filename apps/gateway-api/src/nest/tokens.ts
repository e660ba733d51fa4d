export const GATEWAY_API_CONFIG = Symbol('GATEWAY_API_CONFIG')
export const GATEWAY_API_RUNTIME = Symbol('GATEWAY_API_RUNTIME')
export const GATEWAY_API_LOGGER = Symbol('GATEWAY_API_LOGGER')
export const GATEWAY_API_TOKEN_VERIFIER = Symbol('GATEWAY_API_TOKEN_VERIFIER')
