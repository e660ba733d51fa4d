import {randomBytes} from 'node:crypto'
import {tmpdir} from 'node:os'
import {join} from 'node:path'

import {LogLevelSchema, type LogLevel} from '@prefab-gateway/logging'
import {ContinuationPolicySchema, type ContinuationPolicy} from '@prefab-gateway/schemas'
import {z} from 'zod'

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value
  }

  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? value : parsed
}, z.number().int().positive())

const booleanFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value
  }

  const normalized = value.trim().toLowerCase()
  if (normalized === 'true' || normalized === '1') {
    return true
  }
  if (normalized === 'false' || normalized === '0') {
    return false
  }

  return value
}, z.boolean())

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length === 0 ? undefined : trimmed
}, z.string().optional())

const invalidJson = Symbol('invalid_json')

const optionalJson = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  if (trimmed.length === 0) {
    return undefined
  }

  try {
    return JSON.parse(trimmed)
  } catch {
    return invalidJson
  }
}, z.unknown().optional())

const SecretKeysSchema = z.record(z.string().min(1), z.string().min(1))

const parseCommaList = (raw: string | undefined) =>
  (raw ?? '')
    .split(',')
    .map(value => value.trim())
    .filter(value => value.length > 0)

const parseCorsAllowedOrigins = ({
  raw,
  envVarName
}: {
  raw: string | undefined
  envVarName: string
}) => {
  const origins = parseCommaList(raw)

  for (const origin of origins) {
    let parsed: URL
    try {
      parsed = new URL(origin)
    } catch {
      throw new Error(`${envVarName} contains an invalid URL origin: ${origin}`)
    }

    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new Error(`${envVarName} contains an unsupported origin protocol: ${origin}`)
    }
  }

  return origins
}

const parseSecretKeys = ({
  raw,
  activeKeyId,
  requireConfiguredKeys
}: {
  raw: unknown
  activeKeyId: string
  requireConfiguredKeys: boolean
}): Record<string, string> => {
  if (raw === invalidJson) {
    throw new Error('GATEWAY_SECRET_KEYS_JSON must be valid JSON')
  }

  if (raw === undefined) {
    if (requireConfiguredKeys) {
      throw new Error('GATEWAY_SECRET_KEYS_JSON is required in production')
    }

    return {[activeKeyId]: randomBytes(32).toString('base64')}
  }

  const parsed = SecretKeysSchema.safeParse(raw)
  if (!parsed.success) {
    throw new Error('GATEWAY_SECRET_KEYS_JSON must be an object of key id to base64 key')
  }

  for (const [keyId, encodedKey] of Object.entries(parsed.data)) {
    if (Buffer.from(encodedKey, 'base64').length !== 32) {
      throw new Error(`GATEWAY_SECRET_KEYS_JSON key ${keyId} must decode to exactly 32 bytes`)
    }
  }

  if (!(activeKeyId in parsed.data)) {
    throw new Error(`GATEWAY_SECRET_ACTIVE_KEY_ID ${activeKeyId} is not present in GATEWAY_SECRET_KEYS_JSON`)
  }

  return parsed.data
}

const requireInProduction = ({
  value,
  production,
  envVarName
}: {
  value: string | undefined
  production: boolean
  envVarName: string
}) => {
  if (value) {
    return value
  }

  if (production) {
    throw new Error(`${envVarName} is required in production`)
  }

  return randomBytes(32).toString('hex')
}

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    GATEWAY_HOST: z.string().default('0.0.0.0'),
    GATEWAY_PORT: numberFromEnv.default(8080),
    GATEWAY_MAX_BODY_BYTES: numberFromEnv.default(1024 * 1024),
    GATEWAY_LOG_LEVEL: LogLevelSchema.optional(),
    GATEWAY_LOG_REDACT_EXTRA_KEYS: optionalString,
    GATEWAY_CORS_ALLOWED_ORIGINS: optionalString,
    GATEWAY_JWT_SECRET: optionalString,
    GATEWAY_JWT_AUDIENCE: z.string().trim().min(1).default('prefab-gateway'),
    GATEWAY_JWT_ISSUER: optionalString,
    GATEWAY_SECRET_KEYS_JSON: optionalJson,
    GATEWAY_SECRET_ACTIVE_KEY_ID: z.string().trim().min(1).default('v1'),
    GATEWAY_WEBHOOK_SECRET: optionalString,
    GATEWAY_REDIS_URL: optionalString,
    GATEWAY_REDIS_CONNECT_TIMEOUT_MS: numberFromEnv.default(2_000),
    GATEWAY_REDIS_KEY_PREFIX: z.string().trim().min(1).default('prefab-gateway'),
    GATEWAY_SPEC_CACHE_TTL_SECONDS: numberFromEnv.default(300),
    GATEWAY_SPEC_SOURCE_URL: z.url({protocol: /^https?$/u}).optional(),
    GATEWAY_STORAGE_BACKEND: z.enum(['s3', 'local']).default('s3'),
    GATEWAY_STORAGE_LOCAL_ROOT: optionalString,
    GATEWAY_S3_REGION: z.string().trim().min(1).default('us-east-1'),
    GATEWAY_S3_ENDPOINT: z.url({protocol: /^https?$/u}).optional(),
    GATEWAY_S3_FORCE_PATH_STYLE: booleanFromEnv.default(false),
    GATEWAY_OUTPUT_BUCKET: z.string().trim().min(1).default('prefab-outputs'),
    GATEWAY_OUTPUT_PREFIX: z.string().trim().default('outputs'),
    GATEWAY_TRANSFER_MAX_ATTEMPTS: numberFromEnv.default(3),
    GATEWAY_TRANSFER_BACKOFF_MS: numberFromEnv.default(200),
    GATEWAY_WORKSPACE_ROOT: optionalString,
    GATEWAY_WORKSPACE_MAX_AGE_SECONDS: numberFromEnv.default(3600),
    GATEWAY_WORKSPACE_SWEEP_INTERVAL_SECONDS: numberFromEnv.default(300),
    GATEWAY_WORKSPACE_DISK_WARN_BYTES: numberFromEnv.optional(),
    GATEWAY_ENDPOINT_URL_TEMPLATE: optionalString,
    GATEWAY_INVOKE_TIMEOUT_MS: numberFromEnv.default(30_000),
    GATEWAY_PIPELINE_TIMEOUT_MS: numberFromEnv.default(120_000),
    GATEWAY_CONTINUATION_POLICY: ContinuationPolicySchema.default('abort')
  })
  .strict()

export type StorageConfig =
  | {
      backend: 's3'
      region: string
      endpoint?: string
      forcePathStyle: boolean
    }
  | {
      backend: 'local'
      root: string
    }

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production'
  host: string
  port: number
  maxBodyBytes: number
  logging: {
    level: LogLevel
    redactExtraKeys: string[]
  }
  corsAllowedOrigins: string[]
  auth: {
    jwtSecret: Uint8Array
    audience: string
    issuer?: string
  }
  secrets: {
    keys: Record<string, string>
    activeKeyId: string
  }
  webhookSecret: string
  redis?: {
    url: string
    connectTimeoutMs: number
    keyPrefix: string
  }
  specs: {
    cacheTtlSeconds: number
    sourceUrl?: string
  }
  storage: StorageConfig
  transfer: {
    outputBucket: string
    outputPrefix: string
    maxAttempts: number
    backoffMs: number
  }
  workspace: {
    root: string
    maxAgeSeconds: number
    sweepIntervalSeconds: number
    diskWarnBytes?: number
  }
  endpointUrlTemplate?: string
  pipeline: {
    invokeTimeoutMs: number
    pipelineTimeoutMs: number
    continuationPolicy: ContinuationPolicy
  }
}

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  GATEWAY_HOST: env.GATEWAY_HOST,
  GATEWAY_PORT: env.GATEWAY_PORT,
  GATEWAY_MAX_BODY_BYTES: env.GATEWAY_MAX_BODY_BYTES,
  GATEWAY_LOG_LEVEL: env.GATEWAY_LOG_LEVEL,
  GATEWAY_LOG_REDACT_EXTRA_KEYS: env.GATEWAY_LOG_REDACT_EXTRA_KEYS,
  GATEWAY_CORS_ALLOWED_ORIGINS: env.GATEWAY_CORS_ALLOWED_ORIGINS,
  GATEWAY_JWT_SECRET: env.GATEWAY_JWT_SECRET,
  GATEWAY_JWT_AUDIENCE: env.GATEWAY_JWT_AUDIENCE,
  GATEWAY_JWT_ISSUER: env.GATEWAY_JWT_ISSUER,
  GATEWAY_SECRET_KEYS_JSON: env.GATEWAY_SECRET_KEYS_JSON,
  GATEWAY_SECRET_ACTIVE_KEY_ID: env.GATEWAY_SECRET_ACTIVE_KEY_ID,
  GATEWAY_WEBHOOK_SECRET: env.GATEWAY_WEBHOOK_SECRET,
  GATEWAY_REDIS_URL: env.GATEWAY_REDIS_URL,
  GATEWAY_REDIS_CONNECT_TIMEOUT_MS: env.GATEWAY_REDIS_CONNECT_TIMEOUT_MS,
  GATEWAY_REDIS_KEY_PREFIX: env.GATEWAY_REDIS_KEY_PREFIX,
  GATEWAY_SPEC_CACHE_TTL_SECONDS: env.GATEWAY_SPEC_CACHE_TTL_SECONDS,
  GATEWAY_SPEC_SOURCE_URL: env.GATEWAY_SPEC_SOURCE_URL,
  GATEWAY_STORAGE_BACKEND: env.GATEWAY_STORAGE_BACKEND,
  GATEWAY_STORAGE_LOCAL_ROOT: env.GATEWAY_STORAGE_LOCAL_ROOT,
  GATEWAY_S3_REGION: env.GATEWAY_S3_REGION,
  GATEWAY_S3_ENDPOINT: env.GATEWAY_S3_ENDPOINT,
  GATEWAY_S3_FORCE_PATH_STYLE: env.GATEWAY_S3_FORCE_PATH_STYLE,
  GATEWAY_OUTPUT_BUCKET: env.GATEWAY_OUTPUT_BUCKET,
  GATEWAY_OUTPUT_PREFIX: env.GATEWAY_OUTPUT_PREFIX,
  GATEWAY_TRANSFER_MAX_ATTEMPTS: env.GATEWAY_TRANSFER_MAX_ATTEMPTS,
  GATEWAY_TRANSFER_BACKOFF_MS: env.GATEWAY_TRANSFER_BACKOFF_MS,
  GATEWAY_WORKSPACE_ROOT: env.GATEWAY_WORKSPACE_ROOT,
  GATEWAY_WORKSPACE_MAX_AGE_SECONDS: env.GATEWAY_WORKSPACE_MAX_AGE_SECONDS,
  GATEWAY_WORKSPACE_SWEEP_INTERVAL_SECONDS: env.GATEWAY_WORKSPACE_SWEEP_INTERVAL_SECONDS,
  GATEWAY_WORKSPACE_DISK_WARN_BYTES: env.GATEWAY_WORKSPACE_DISK_WARN_BYTES,
  GATEWAY_ENDPOINT_URL_TEMPLATE: env.GATEWAY_ENDPOINT_URL_TEMPLATE,
  GATEWAY_INVOKE_TIMEOUT_MS: env.GATEWAY_INVOKE_TIMEOUT_MS,
  GATEWAY_PIPELINE_TIMEOUT_MS: env.GATEWAY_PIPELINE_TIMEOUT_MS,
  GATEWAY_CONTINUATION_POLICY: env.GATEWAY_CONTINUATION_POLICY
})

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.parse(toEnvInput(env))
  const production = parsed.NODE_ENV === 'production'

  const jwtSecret = requireInProduction({
    value: parsed.GATEWAY_JWT_SECRET,
    production,
    envVarName: 'GATEWAY_JWT_SECRET'
  })
  const webhookSecret = requireInProduction({
    value: parsed.GATEWAY_WEBHOOK_SECRET,
    production,
    envVarName: 'GATEWAY_WEBHOOK_SECRET'
  })
  const secretKeys = parseSecretKeys({
    raw: parsed.GATEWAY_SECRET_KEYS_JSON,
    activeKeyId: parsed.GATEWAY_SECRET_ACTIVE_KEY_ID,
    requireConfiguredKeys: production
  })

  let storage: StorageConfig
  if (parsed.GATEWAY_STORAGE_BACKEND === 'local') {
    if (!parsed.GATEWAY_STORAGE_LOCAL_ROOT) {
      throw new Error('GATEWAY_STORAGE_LOCAL_ROOT is required when GATEWAY_STORAGE_BACKEND is local')
    }
    storage = {backend: 'local', root: parsed.GATEWAY_STORAGE_LOCAL_ROOT}
  } else {
    storage = {
      backend: 's3',
      region: parsed.GATEWAY_S3_REGION,
      ...(parsed.GATEWAY_S3_ENDPOINT ? {endpoint: parsed.GATEWAY_S3_ENDPOINT} : {}),
      forcePathStyle: parsed.GATEWAY_S3_FORCE_PATH_STYLE
    }
  }

  if (parsed.GATEWAY_INVOKE_TIMEOUT_MS > parsed.GATEWAY_PIPELINE_TIMEOUT_MS) {
    throw new Error('GATEWAY_INVOKE_TIMEOUT_MS must not exceed GATEWAY_PIPELINE_TIMEOUT_MS')
  }

  const template = parsed.GATEWAY_ENDPOINT_URL_TEMPLATE
  if (template && !template.includes('{service_id}')) {
    throw new Error('GATEWAY_ENDPOINT_URL_TEMPLATE must contain {service_id}')
  }

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.GATEWAY_HOST,
    port: parsed.GATEWAY_PORT,
    maxBodyBytes: parsed.GATEWAY_MAX_BODY_BYTES,
    logging: {
      level: parsed.GATEWAY_LOG_LEVEL ?? (parsed.NODE_ENV === 'test' ? 'silent' : 'info'),
      redactExtraKeys: parseCommaList(parsed.GATEWAY_LOG_REDACT_EXTRA_KEYS)
    },
    corsAllowedOrigins: parseCorsAllowedOrigins({
      raw: parsed.GATEWAY_CORS_ALLOWED_ORIGINS,
      envVarName: 'GATEWAY_CORS_ALLOWED_ORIGINS'
    }),
    auth: {
      jwtSecret: new TextEncoder().encode(jwtSecret),
      audience: parsed.GATEWAY_JWT_AUDIENCE,
      ...(parsed.GATEWAY_JWT_ISSUER ? {issuer: parsed.GATEWAY_JWT_ISSUER} : {})
    },
    secrets: {
      keys: secretKeys,
      activeKeyId: parsed.GATEWAY_SECRET_ACTIVE_KEY_ID
    },
    webhookSecret,
    ...(parsed.GATEWAY_REDIS_URL
      ? {
          redis: {
            url: parsed.GATEWAY_REDIS_URL,
            connectTimeoutMs: parsed.GATEWAY_REDIS_CONNECT_TIMEOUT_MS,
            keyPrefix: parsed.GATEWAY_REDIS_KEY_PREFIX
          }
        }
      : {}),
    specs: {
      cacheTtlSeconds: parsed.GATEWAY_SPEC_CACHE_TTL_SECONDS,
      ...(parsed.GATEWAY_SPEC_SOURCE_URL ? {sourceUrl: parsed.GATEWAY_SPEC_SOURCE_URL} : {})
    },
    storage,
    transfer: {
      outputBucket: parsed.GATEWAY_OUTPUT_BUCKET,
      outputPrefix: parsed.GATEWAY_OUTPUT_PREFIX,
      maxAttempts: parsed.GATEWAY_TRANSFER_MAX_ATTEMPTS,
      backoffMs: parsed.GATEWAY_TRANSFER_BACKOFF_MS
    },
    workspace: {
      root: parsed.GATEWAY_WORKSPACE_ROOT ?? join(tmpdir(), 'prefab-gateway-workspaces'),
      maxAgeSeconds: parsed.GATEWAY_WORKSPACE_MAX_AGE_SECONDS,
      sweepIntervalSeconds: parsed.GATEWAY_WORKSPACE_SWEEP_INTERVAL_SECONDS,
      ...(parsed.GATEWAY_WORKSPACE_DISK_WARN_BYTES !== undefined
        ? {diskWarnBytes: parsed.GATEWAY_WORKSPACE_DISK_WARN_BYTES}
        : {})
    },
    ...(template ? {endpointUrlTemplate: template} : {}),
    pipeline: {
      invokeTimeoutMs: parsed.GATEWAY_INVOKE_TIMEOUT_MS,
      pipelineTimeoutMs: parsed.GATEWAY_PIPELINE_TIMEOUT_MS,
      continuationPolicy: parsed.GATEWAY_CONTINUATION_POLICY
    }
  }
}
