import {Controller, Get, Inject, Post, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'
import {DeploymentEventSchema} from '@prefab-gateway/schemas'

import {verifyWebhookSignature} from '../../deployments'
import {notFound} from '../../errors'
import {decodePathParam, parseJsonBuffer, readBodyBuffer, requireJsonContentType, sendJson} from '../../http'
import {GatewayControllerContext} from '../controllerContext'

@Controller()
export class WebhooksController {
  public constructor(@Inject(GatewayControllerContext) private readonly context: GatewayControllerContext) {}

  @Post('/webhooks/deployments')
  public async receive(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        requireJsonContentType(request)
        const rawBody = await readBodyBuffer({request, maxBodyBytes: this.context.config.maxBodyBytes})
        const signatureHeader = request.headers['x-webhook-signature']
        verifyWebhookSignature({
          secret: this.context.config.webhookSecret,
          rawBody,
          signatureHeader: Array.isArray(signatureHeader) ? signatureHeader[0] : signatureHeader
        })

        const event = parseJsonBuffer({raw: rawBody, schema: DeploymentEventSchema})
        const outcome = await this.context.runtime.webhooks.process({event, correlationId})

        sendJson({
          response,
          status: 200,
          correlationId,
          payload: outcome
        })
      }
    })
  }

  @Get('/webhooks/events/:eventId')
  public async status(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        await this.context.authenticate({request, scope: 'admin'})
        const eventId = decodePathParam(request.params.eventId ?? '')
        const record = await this.context.runtime.webhookEvents.get(eventId)
        if (!record) {
          throw notFound('webhook_event_not_found', `No webhook event ${eventId}`)
        }

        sendJson({
          response,
          status: 200,
          correlationId,
          payload: record
        })
      }
    })
  }
}
