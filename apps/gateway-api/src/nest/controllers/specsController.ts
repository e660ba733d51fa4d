import {Controller, Get, Inject, Put, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'
import {InterfaceSpecSchema, type InterfaceSpec} from '@prefab-gateway/schemas'
import {SpecSourceError} from '@prefab-gateway/spec-store'

import {notFound, serviceUnavailable, unprocessable} from '../../errors'
import {decodePathParam, parseJsonBody, sendJson, sendNoContent} from '../../http'
import {GatewayControllerContext} from '../controllerContext'

const specCoordinates = (request: Request) => ({
  serviceId: decodePathParam(request.params.serviceId ?? ''),
  version: decodePathParam(request.params.version ?? '')
})

@Controller()
export class SpecsController {
  public constructor(@Inject(GatewayControllerContext) private readonly context: GatewayControllerContext) {}

  @Get('/v1/services/:serviceId/:version/spec')
  public async read(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        await this.context.authenticate({request, scope: 'prefab:read'})
        const coordinates = specCoordinates(request)

        let spec: InterfaceSpec | null
        try {
          spec = await this.context.runtime.specs.get(coordinates)
        } catch (error) {
          if (error instanceof SpecSourceError) {
            throw serviceUnavailable(error.code, error.message)
          }
          throw error
        }

        if (!spec) {
          throw notFound('spec_not_found', `No interface spec for ${coordinates.serviceId}@${coordinates.version}`)
        }

        sendJson({
          response,
          status: 200,
          correlationId,
          payload: spec
        })
      }
    })
  }

  @Put('/v1/services/:serviceId/:version/spec')
  public async publish(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const principal = await this.context.authenticate({request, scope: 'admin'})
        const coordinates = specCoordinates(request)
        const body = await parseJsonBody({
          request,
          schema: InterfaceSpecSchema,
          maxBodyBytes: this.context.config.maxBodyBytes
        })

        if (body.service_id !== coordinates.serviceId || body.version !== coordinates.version) {
          throw unprocessable('spec_coordinates_mismatch', 'Body service_id and version must match the path')
        }

        await this.context.runtime.specs.publish(body)
        sendNoContent({response, correlationId})

        this.context.recordAuditNonBlocking({
          correlationId,
          input: {
            action: 'spec.published',
            callerId: principal.callerId,
            outcome: 'success',
            metadata: {
              service_id: body.service_id,
              version: body.version,
              parameter_count: body.parameters.length
            }
          }
        })
      }
    })
  }
}
