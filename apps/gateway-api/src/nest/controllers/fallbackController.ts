import {All, Controller, Inject, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import {notFound} from '../../errors'
import {GatewayControllerContext} from '../controllerContext'

@Controller()
export class FallbackController {
  public constructor(@Inject(GatewayControllerContext) private readonly context: GatewayControllerContext) {}

  @All('*')
  public async handle(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: ({method, pathname}) => {
        throw notFound('route_not_found', `No route for ${method} ${pathname}`)
      }
    })
  }
}
