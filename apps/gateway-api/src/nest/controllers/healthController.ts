import {Controller, Get, Inject, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import {serviceUnavailable} from '../../errors'
import {sendJson} from '../../http'
import {GatewayControllerContext} from '../controllerContext'

@Controller()
export class HealthController {
  public constructor(@Inject(GatewayControllerContext) private readonly context: GatewayControllerContext) {}

  @Get('/healthz')
  public async liveness(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: ({correlationId}) => {
        sendJson({response, status: 200, correlationId, payload: {status: 'ok'}})
      }
    })
  }

  // ready once jobs can get a workspace
  @Get('/readyz')
  public async readiness(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const workspaceRootReady = await this.context.runtime.workspaces.ensureRoot().catch((error: unknown) => {
          this.context.logger.warn({
            event: 'readiness.workspace_root.failed',
            component: 'http.health',
            message: 'Workspace root is not usable',
            metadata: {error}
          })
          return false
        })
        if (!workspaceRootReady) {
          throw serviceUnavailable('workspace_root_unavailable', 'Workspace root is not usable')
        }

        sendJson({
          response,
          status: 200,
          correlationId,
          payload: {status: 'ready', policy: this.context.config.pipeline.continuationPolicy}
        })
      }
    })
  }
}
