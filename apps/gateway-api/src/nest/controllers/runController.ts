import {Controller, Inject, Post, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'
import {JobSchema, RunRequestSchema} from '@prefab-gateway/schemas'

import {errorKindStatus} from '../../errors'
import {parseJsonBody, sendJson} from '../../http'
import {GatewayControllerContext} from '../controllerContext'

@Controller()
export class RunController {
  public constructor(@Inject(GatewayControllerContext) private readonly context: GatewayControllerContext) {}

  @Post('/v1/run')
  public async handle(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      handler: async ({correlationId}) => {
        const principal = await this.context.authenticate({request, scope: 'prefab:execute'})
        const body = await parseJsonBody({
          request,
          schema: RunRequestSchema,
          maxBodyBytes: this.context.config.maxBodyBytes
        })

        const job = JobSchema.parse(
          await this.context.runtime.pipeline.execute({
            callerId: principal.callerId,
            correlationId,
            calls: body.calls
          })
        )

        // a lone failed call answers with its own status; multi-call jobs always answer 200
        const [onlyResult] = job.results
        const status =
          body.calls.length === 1 && onlyResult?.status === 'FAILURE' ? errorKindStatus[onlyResult.error.kind] : 200

        sendJson({
          response,
          status,
          correlationId,
          payload: job,
          headers: {'x-job-id': job.job_id}
        })
      }
    })
  }
}
