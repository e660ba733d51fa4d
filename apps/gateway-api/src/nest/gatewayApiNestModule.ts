import {Module, type DynamicModule} from '@nestjs/common'
import type {StructuredLogger} from '@prefab-gateway/logging'

import {createTokenVerifier} from '../auth'
import type {ServiceConfig} from '../config'
import type {GatewayRuntime} from '../runtime'
import {GatewayControllerContext} from './controllerContext'
import {AuditController} from './controllers/auditController'
import {FallbackController} from './controllers/fallbackController'
import {FilesController} from './controllers/filesController'
import {HealthController} from './controllers/healthController'
import {RunController} from './controllers/runController'
import {SecretsController} from './controllers/secretsController'
import {SpecsController} from './controllers/specsController'
import {WebhooksController} from './controllers/webhooksController'
import {GATEWAY_API_CONFIG, GATEWAY_API_LOGGER, GATEWAY_API_RUNTIME, GATEWAY_API_TOKEN_VERIFIER} from './tokens'

export type GatewayApiNestModuleOptions = {
  config: ServiceConfig
  runtime: GatewayRuntime
  logger: StructuredLogger
}

@Module({})
export class GatewayApiNestModule {
  public static register(options: GatewayApiNestModuleOptions): DynamicModule {
    return {
      module: GatewayApiNestModule,
      // the catch-all fallback must stay last
      controllers: [
        HealthController,
        RunController,
        SecretsController,
        FilesController,
        SpecsController,
        WebhooksController,
        AuditController,
        FallbackController
      ],
      providers: [
        {
          provide: GATEWAY_API_CONFIG,
          useValue: options.config
        },
        {
          provide: GATEWAY_API_RUNTIME,
          useValue: options.runtime
        },
        {
          provide: GATEWAY_API_LOGGER,
          useValue: options.logger
        },
        {
          provide: GATEWAY_API_TOKEN_VERIFIER,
          inject: [GATEWAY_API_CONFIG],
          useFactory: (config: ServiceConfig) =>
            createTokenVerifier({
              secret: config.auth.jwtSecret,
              audience: config.auth.audience,
              ...(config.auth.issuer ? {issuer: config.auth.issuer} : {})
            })
        },
        GatewayControllerContext
      ]
    }
  }
}
