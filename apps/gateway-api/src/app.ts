import type {Server} from 'node:http'

import helmet from 'helmet'
import express from 'express'
import {NestFactory} from '@nestjs/core'
import {ExpressAdapter} from '@nestjs/platform-express'
import type {FetchLike} from '@prefab-gateway/invoker'
import {createStructuredLogger, type StructuredLogger} from '@prefab-gateway/logging'
import type {StorageBackend} from '@prefab-gateway/object-transfer'

import type {ServiceConfig} from './config'
import {createProcessInfrastructure, type ProcessInfrastructure} from './infrastructure'
import {GatewayApiNestModule} from './nest/gatewayApiNestModule'
import {createGatewayRuntime} from './runtime'

export const appName = 'gateway-api'

export const createGatewayApp = async ({
  config,
  logger = createStructuredLogger({
    service: appName,
    env: config.nodeEnv,
    level: config.logging.level,
    extraSensitiveKeys: config.logging.redactExtraKeys
  }),
  fetchImpl,
  storageBackend
}: {
  config: ServiceConfig
  logger?: StructuredLogger
  fetchImpl?: FetchLike
  storageBackend?: StorageBackend
}) => {
  let infrastructure: ProcessInfrastructure | null = null
  try {
    infrastructure = await createProcessInfrastructure({config})
    const processInfrastructure = infrastructure
    const runtime = createGatewayRuntime({
      config,
      infrastructure: processInfrastructure,
      logger,
      ...(fetchImpl ? {fetchImpl} : {}),
      ...(storageBackend ? {storageBackend} : {})
    })

    const expressApp = express()
    expressApp.disable('x-powered-by')
    expressApp.use(
      helmet({
        contentSecurityPolicy: false
      })
    )

    const nestApp = await NestFactory.create(
      GatewayApiNestModule.register({config, runtime, logger}),
      new ExpressAdapter(expressApp),
      {
        bodyParser: false,
        logger: config.nodeEnv === 'test' ? false : ['error', 'warn', 'log']
      }
    )

    if (config.corsAllowedOrigins.length > 0) {
      nestApp.enableCors({
        origin: config.corsAllowedOrigins
      })
    }

    await nestApp.init()

    const server: Server = nestApp.getHttpServer()

    const start = async () => {
      await nestApp.listen(config.port, config.host)
      runtime.sweeper.start()
      logger.info({
        event: 'process.started',
        component: 'process.app',
        message: `Gateway listening on ${config.host}:${String(config.port)}`,
        metadata: {
          storage_backend: config.storage.backend,
          redis_enabled: processInfrastructure.enabled,
          continuation_policy: config.pipeline.continuationPolicy
        }
      })
    }

    const stop = async () => {
      runtime.sweeper.stop()
      await Promise.allSettled([nestApp.close(), processInfrastructure.close()])
    }

    return {
      server,
      start,
      stop,
      runtime,
      logger,
      infrastructure: processInfrastructure
    }
  } catch (error) {
    if (infrastructure) {
      await infrastructure.close()
    }

    throw error
  }
}

export type GatewayApp = Awaited<ReturnType<typeof createGatewayApp>>
