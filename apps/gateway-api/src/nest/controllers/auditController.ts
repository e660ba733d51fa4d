import {Controller, Get, Inject, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import {badRequest, internal} from '../../errors'
import {sendJson} from '../../http'
import {GatewayControllerContext} from '../controllerContext'

@Controller()
export class AuditController {
  public constructor(@Inject(GatewayControllerContext) private readonly context: GatewayControllerContext) {}

  @Get('/v1/audit/events')
  public async list(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId, url}) => {
        await this.context.authenticate({request, scope: 'admin'})

        const result = await this.context.runtime.audit.queryEvents({
          query: Object.fromEntries(url.searchParams.entries())
        })
        if (!result.ok) {
          throw result.error.code === 'storage_query_failed'
            ? internal(result.error.code, 'Audit events could not be loaded')
            : badRequest(result.error.code, result.error.message)
        }

        sendJson({
          response,
          status: 200,
          correlationId,
          payload: result.value
        })
      }
    })
  }
}
