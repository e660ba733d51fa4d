import {Controller, Get, Inject, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import {sendJson} from '../../http'
import {GatewayControllerContext} from '../controllerContext'

@Controller()
export class FilesController {
  public constructor(@Inject(GatewayControllerContext) private readonly context: GatewayControllerContext) {}

  @Get('/v1/files')
  public async list(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const principal = await this.context.authenticate({request, scope: 'prefab:read'})
        const uris = await this.context.runtime.acl.listOwned({callerId: principal.callerId})

        sendJson({
          response,
          status: 200,
          correlationId,
          payload: {uris}
        })
      }
    })
  }
}
