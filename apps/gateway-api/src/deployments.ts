import {createHmac, timingSafeEqual} from 'node:crypto'

import type {AuditService} from '@prefab-gateway/audit'
import type {EndpointRegistry, WebhookEventStore} from '@prefab-gateway/invoker'
import {createNoopLogger, type StructuredLogger} from '@prefab-gateway/logging'
import type {DeploymentEvent, DeploymentRecord} from '@prefab-gateway/schemas'
import type {InterfaceSpecStore} from '@prefab-gateway/spec-store'

import {unauthorized} from './errors'

const SIGNATURE_PREFIX = 'sha256='

export const WEBHOOK_CALLER_ID = 'deployment-webhook'

export const signWebhookBody = ({secret, rawBody}: {secret: string; rawBody: Buffer}) =>
  `${SIGNATURE_PREFIX}${createHmac('sha256', secret).update(rawBody).digest('hex')}`

export const verifyWebhookSignature = ({
  secret,
  rawBody,
  signatureHeader
}: {
  secret: string
  rawBody: Buffer
  signatureHeader: string | undefined
}) => {
  if (!signatureHeader?.startsWith(SIGNATURE_PREFIX)) {
    throw unauthorized('webhook_signature_invalid', 'Webhook signature is missing')
  }

  const provided = Buffer.from(signatureHeader.slice(SIGNATURE_PREFIX.length), 'hex')
  const expected = createHmac('sha256', secret).update(rawBody).digest()
  if (provided.length !== expected.length || !timingSafeEqual(provided, expected)) {
    throw unauthorized('webhook_signature_invalid', 'Webhook signature does not match')
  }
}

export type WebhookOutcome = {status: 'duplicate'} | {status: 'processed'; deployment: DeploymentRecord}

export type DeploymentWebhookProcessor = {
  process: (input: {event: DeploymentEvent; correlationId: string}) => Promise<WebhookOutcome>
}

/**
 * Applies deployment lifecycle events once per event id. An event whose
 * previous attempt failed can be delivered again.
 */
export const createDeploymentWebhookProcessor = ({
  registry,
  events,
  specs,
  audit,
  logger = createNoopLogger(),
  now = () => new Date()
}: {
  registry: Pick<EndpointRegistry, 'applyEvent'>
  events: WebhookEventStore
  specs: Pick<InterfaceSpecStore, 'invalidate'>
  audit: Pick<AuditService, 'recordEvent'>
  logger?: StructuredLogger
  now?: () => Date
}): DeploymentWebhookProcessor => {
  const recordAudit = async ({
    event,
    correlationId,
    outcome,
    metadata
  }: {
    event: DeploymentEvent
    correlationId: string
    outcome: 'success' | 'failure'
    metadata: Record<string, unknown>
  }) => {
    const result = await audit.recordEvent({
      input: {
        action: 'webhook.processed',
        caller_id: WEBHOOK_CALLER_ID,
        correlation_id: correlationId,
        outcome,
        metadata: {
          event_id: event.event_id,
          event_type: event.event_type,
          service_id: event.service_id,
          version: event.version,
          ...metadata
        }
      }
    })
    if (!result.ok) {
      logger.warn({
        event: 'audit.write.failed',
        component: 'deployments.webhook',
        message: 'Webhook audit event could not be recorded',
        reason_code: result.error.code
      })
    }
  }

  return {
    process: async ({event, correlationId}) => {
      const claimed = {
        event_id: event.event_id,
        event_type: event.event_type,
        status: 'processed' as const,
        received_at: now().toISOString()
      }

      if (!(await events.claim(claimed))) {
        logger.info({
          event: 'deployment.webhook.duplicate',
          component: 'deployments.webhook',
          message: 'Webhook event already processed',
          service_id: event.service_id,
          metadata: {event_id: event.event_id}
        })
        return {status: 'duplicate'}
      }

      try {
        const deployment = await registry.applyEvent(event)
        const invalidated =
          event.event_type === 'deployment.succeeded'
            ? await specs.invalidate({serviceId: event.service_id, version: event.version})
            : false

        logger.info({
          event: 'deployment.webhook.applied',
          component: 'deployments.webhook',
          message: `Deployment is now ${deployment.status}`,
          service_id: event.service_id,
          metadata: {
            event_id: event.event_id,
            version: event.version,
            status: deployment.status,
            spec_cache_invalidated: invalidated
          }
        })
        await recordAudit({event, correlationId, outcome: 'success', metadata: {status: deployment.status}})
        return {status: 'processed', deployment}
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Webhook processing failed'
        await events.update({...claimed, status: 'failed', error: message})
        logger.error({
          event: 'deployment.webhook.failed',
          component: 'deployments.webhook',
          message: 'Webhook event could not be applied',
          service_id: event.service_id,
          reason_code: 'webhook_processing_failed',
          metadata: {event_id: event.event_id, error}
        })
        await recordAudit({event, correlationId, outcome: 'failure', metadata: {error: message}})
        throw error
      }
    }
  }
}
