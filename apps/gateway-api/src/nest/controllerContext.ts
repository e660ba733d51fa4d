import {randomUUID} from 'node:crypto'
import type {IncomingMessage} from 'node:http'

import {Inject, Injectable} from '@nestjs/common'
import type {Request, Response} from 'express'
import {runWithLogContext, setLogContextFields, type StructuredLogger} from '@prefab-gateway/logging'
import type {AuditAction} from '@prefab-gateway/schemas'

import {requireScope, type CallerPrincipal, type GatewayScope, type TokenVerifier} from '../auth'
import type {ServiceConfig} from '../config'
import {badRequest, isAppError} from '../errors'
import {extractCorrelationId, sendError} from '../http'
import type {GatewayRuntime} from '../runtime'
import {GATEWAY_API_CONFIG, GATEWAY_API_LOGGER, GATEWAY_API_RUNTIME, GATEWAY_API_TOKEN_VERIFIER} from './tokens'

export type RequestHandlerContext = {
  correlationId: string
  method: string
  pathname: string
  url: URL
}

type AuditInput = {
  action: AuditAction
  callerId: string
  outcome: 'success' | 'failure'
  metadata: Record<string, unknown>
}

const sanitizeRouteForLog = ({rawUrl}: {rawUrl: string | undefined}) => {
  if (!rawUrl) {
    return '/'
  }

  const routeWithoutQuery = rawUrl.split('?', 1)[0] ?? ''
  return routeWithoutQuery.length > 0 ? routeWithoutQuery : '/'
}

const parseUrl = (request: IncomingMessage) => {
  try {
    const host = request.headers.host ?? 'localhost'
    return new URL(request.url ?? '/', `http://${host}`)
  } catch {
    throw badRequest('request_url_invalid', 'Request URL is invalid')
  }
}

@Injectable()
export class GatewayControllerContext {
  public constructor(
    @Inject(GATEWAY_API_CONFIG) public readonly config: ServiceConfig,
    @Inject(GATEWAY_API_RUNTIME) public readonly runtime: GatewayRuntime,
    @Inject(GATEWAY_API_LOGGER) public readonly logger: StructuredLogger,
    @Inject(GATEWAY_API_TOKEN_VERIFIER) private readonly verifyToken: TokenVerifier
  ) {}

  public async authenticate({request, scope}: {request: IncomingMessage; scope: GatewayScope}): Promise<CallerPrincipal> {
    let principal: CallerPrincipal
    try {
      principal = await this.verifyToken(request.headers.authorization)
      requireScope({principal, scope})
    } catch (error) {
      this.logger.warn({
        event: 'auth.denied',
        component: 'http.auth',
        message: 'Caller authentication failed',
        reason_code: isAppError(error) ? error.code : 'unauthenticated',
        metadata: {scope}
      })
      throw error
    }

    setLogContextFields({caller_id: principal.callerId})
    return principal
  }

  public recordAuditNonBlocking({input, correlationId}: {input: AuditInput; correlationId: string}) {
    void this.runtime.audit
      .recordEvent({
        input: {
          action: input.action,
          caller_id: input.callerId,
          correlation_id: correlationId,
          outcome: input.outcome,
          metadata: input.metadata
        }
      })
      .then(result => {
        if (!result.ok) {
          this.logAuditFailure({action: input.action, correlationId, reasonCode: result.error.code})
        }
      })
      .catch(() => {
        this.logAuditFailure({action: input.action, correlationId, reasonCode: 'audit_emit_failed'})
      })
  }

  public async handleRequest({
    request,
    response,
    handler
  }: {
    request: Request
    response: Response
    handler: (context: RequestHandlerContext) => void | Promise<void>
  }) {
    const correlationId = extractCorrelationId(request)
    const requestId = randomUUID()
    const startedAtMs = Date.now()
    const requestMethod = request.method

    return runWithLogContext(
      {
        correlation_id: correlationId,
        request_id: requestId,
        method: requestMethod
      },
      async () => {
        let pathname = '/'
        let responseReasonCode: string | undefined

        this.logger.info({
          event: 'request.received',
          component: 'http.server',
          message: 'Request received',
          route: sanitizeRouteForLog({rawUrl: request.url}),
          method: requestMethod
        })

        try {
          const url = parseUrl(request)
          pathname = url.pathname
          setLogContextFields({route: pathname})

          await handler({
            correlationId,
            method: requestMethod,
            pathname,
            url
          })
        } catch (error) {
          if (isAppError(error)) {
            responseReasonCode = error.code
            this.logger.warn({
              event: 'request.rejected',
              component: 'http.server',
              message: `Request rejected: ${error.code}`,
              reason_code: error.code,
              route: pathname,
              method: requestMethod
            })

            sendError({
              response,
              status: error.status,
              error: error.code,
              message: error.message,
              correlationId
            })
            return
          }

          responseReasonCode = 'internal_error'
          this.logger.error({
            event: 'request.failed',
            component: 'http.server',
            message: 'Unexpected internal error',
            reason_code: 'internal_error',
            route: pathname,
            method: requestMethod,
            metadata: {
              error
            }
          })

          sendError({
            response,
            status: 500,
            error: 'internal_error',
            message: 'Unexpected internal error',
            correlationId
          })
        } finally {
          const baseLog = {
            event: 'request.completed',
            component: 'http.server',
            message: 'Request completed',
            route: pathname,
            method: requestMethod,
            status_code: response.statusCode,
            duration_ms: Math.max(0, Date.now() - startedAtMs),
            ...(responseReasonCode ? {reason_code: responseReasonCode} : {})
          }

          if (response.statusCode >= 500) {
            this.logger.error(baseLog)
          } else if (response.statusCode >= 400) {
            this.logger.warn(baseLog)
          } else {
            this.logger.info(baseLog)
          }
        }
      }
    )
  }

  private logAuditFailure({
    action,
    correlationId,
    reasonCode
  }: {
    action: string
    correlationId: string
    reasonCode: string
  }) {
    this.logger.error({
      event: 'audit.emit.failed',
      component: 'http.audit',
      message: 'Audit emit failed',
      correlation_id: correlationId,
      reason_code: reasonCode,
      metadata: {action}
    })
  }
}
