import {Controller, Delete, Get, Inject, Post, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'
import type {VaultErrorCode} from '@prefab-gateway/secret-vault'
import {SecretListResponseSchema, SecretWriteRequestSchema, ServiceIdSchema} from '@prefab-gateway/schemas'

import {badRequest, internal, notFound} from '../../errors'
import {decodePathParam, parseJsonBody, sendJson, sendNoContent} from '../../http'
import {GatewayControllerContext} from '../controllerContext'

const toVaultAppError = ({code, message}: {code: VaultErrorCode; message: string}) => {
  switch (code) {
    case 'secret_key_invalid':
      return badRequest(code, message)
    case 'secret_not_found':
      return notFound(code, message)
    case 'secret_encrypt_failed':
    case 'secret_decrypt_failed':
      return internal(code, 'Secret storage failed')
  }
}

const parseServiceId = (raw: string) => {
  const parsed = ServiceIdSchema.safeParse(decodePathParam(raw))
  if (!parsed.success) {
    throw badRequest('path_param_invalid', 'serviceId must be a lowercase DNS label')
  }
  return parsed.data
}

@Controller()
export class SecretsController {
  public constructor(@Inject(GatewayControllerContext) private readonly context: GatewayControllerContext) {}

  @Post('/v1/secrets')
  public async write(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const principal = await this.context.authenticate({request, scope: 'secrets:manage'})
        const body = await parseJsonBody({
          request,
          schema: SecretWriteRequestSchema,
          maxBodyBytes: this.context.config.maxBodyBytes
        })

        const stored = await this.context.runtime.vault.put({
          callerId: principal.callerId,
          serviceId: body.service_id,
          name: body.secret_name,
          value: body.secret_value
        })
        if (!stored.ok) {
          throw toVaultAppError(stored.error)
        }

        sendNoContent({response, correlationId})

        this.context.recordAuditNonBlocking({
          correlationId,
          input: {
            action: 'secret.written',
            callerId: principal.callerId,
            outcome: 'success',
            metadata: {service_id: body.service_id, name: body.secret_name}
          }
        })
      }
    })
  }

  @Get('/v1/secrets/:serviceId')
  public async list(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const principal = await this.context.authenticate({request, scope: 'secrets:manage'})
        const serviceId = parseServiceId(request.params.serviceId ?? '')
        const secrets = await this.context.runtime.vault.list({callerId: principal.callerId, serviceId})

        sendJson({
          response,
          status: 200,
          correlationId,
          payload: SecretListResponseSchema.parse({service_id: serviceId, secrets})
        })
      }
    })
  }

  @Delete('/v1/secrets/:serviceId/:secretName')
  public async remove(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const principal = await this.context.authenticate({request, scope: 'secrets:manage'})
        const serviceId = parseServiceId(request.params.serviceId ?? '')
        const name = decodePathParam(request.params.secretName ?? '')

        const removed = await this.context.runtime.vault.delete({callerId: principal.callerId, serviceId, name})
        if (!removed.ok) {
          throw toVaultAppError(removed.error)
        }

        sendNoContent({response, correlationId})

        this.context.recordAuditNonBlocking({
          correlationId,
          input: {
            action: 'secret.deleted',
            callerId: principal.callerId,
            outcome: 'success',
            metadata: {service_id: serviceId, name}
          }
        })
      }
    })
  }
}
