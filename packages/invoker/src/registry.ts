import {
  DeploymentRecordSchema,
  WebhookEventRecordSchema,
  type DeploymentEvent,
  type DeploymentRecord,
  type WebhookEventRecord
} from '@prefab-gateway/schemas';

import type {EndpointCoordinates, KeyValueClient} from './contracts';

export type DeploymentStore = {
  get: (coordinates: EndpointCoordinates) => Promise<DeploymentRecord | null>;
  put: (record: DeploymentRecord) => Promise<void>;
};

export type WebhookEventStore = {
  get: (eventId: string) => Promise<WebhookEventRecord | null>;
  /**
   * Records the event unless it was already recorded as processed. Resolves to
   * false for a replay.
   */
  claim: (record: WebhookEventRecord) => Promise<boolean>;
  update: (record: WebhookEventRecord) => Promise<void>;
};

const deploymentKey = ({serviceId, version}: EndpointCoordinates) => `${serviceId}@${version}`;

export const createInMemoryDeploymentStore = (): DeploymentStore => {
  const records = new Map<string, DeploymentRecord>();
  return {
    get: coordinates => Promise.resolve(records.get(deploymentKey(coordinates)) ?? null),
    put: record => {
      records.set(deploymentKey({serviceId: record.service_id, version: record.version}), {...record});
      return Promise.resolve();
    }
  };
};

export const createInMemoryWebhookEventStore = (): WebhookEventStore => {
  const records = new Map<string, WebhookEventRecord>();
  return {
    get: eventId => Promise.resolve(records.get(eventId) ?? null),
    claim: record => {
      const existing = records.get(record.event_id);
      if (existing && existing.status !== 'failed') {
        return Promise.resolve(false);
      }
      records.set(record.event_id, {...record});
      return Promise.resolve(true);
    },
    update: record => {
      records.set(record.event_id, {...record});
      return Promise.resolve();
    }
  };
};

const decodeJson = (raw: string | null): unknown => {
  if (raw === null) {
    return null;
  }
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
};

export const createRedisDeploymentStore = ({
  client,
  keyPrefix
}: {
  client: KeyValueClient;
  keyPrefix: string;
}): DeploymentStore => {
  const redisKey = ({serviceId, version}: EndpointCoordinates) =>
    `${keyPrefix}:deployment:${serviceId}:${version}`;

  return {
    get: async coordinates => {
      const parsed = DeploymentRecordSchema.safeParse(decodeJson(await client.get(redisKey(coordinates))));
      return parsed.success ? parsed.data : null;
    },
    put: async record => {
      await client.set(redisKey({serviceId: record.service_id, version: record.version}), JSON.stringify(record));
    }
  };
};

export const createRedisWebhookEventStore = ({
  client,
  keyPrefix
}: {
  client: KeyValueClient;
  keyPrefix: string;
}): WebhookEventStore => {
  const redisKey = (eventId: string) => `${keyPrefix}:webhook:${encodeURIComponent(eventId)}`;

  const get = async (eventId: string) => {
    const parsed = WebhookEventRecordSchema.safeParse(decodeJson(await client.get(redisKey(eventId))));
    return parsed.success ? parsed.data : null;
  };

  return {
    get,
    claim: async record => {
      if (await client.set(redisKey(record.event_id), JSON.stringify(record), {NX: true})) {
        return true;
      }

      // a failed event may be delivered again
      const existing = await get(record.event_id);
      if (existing?.status !== 'failed') {
        return false;
      }
      await client.set(redisKey(record.event_id), JSON.stringify(record));
      return true;
    },
    update: async record => {
      await client.set(redisKey(record.event_id), JSON.stringify(record));
    }
  };
};

export type EndpointRegistry = {
  /** Null when no live endpoint is known for the coordinates. */
  resolve: (coordinates: EndpointCoordinates) => Promise<string | null>;
  get: (coordinates: EndpointCoordinates) => Promise<DeploymentRecord | null>;
  applyEvent: (event: DeploymentEvent) => Promise<DeploymentRecord>;
};

const expandTemplate = (template: string, {serviceId, version}: EndpointCoordinates) =>
  template
    .replaceAll('{service_id}', encodeURIComponent(serviceId))
    .replaceAll('{version}', encodeURIComponent(version));

const nextRecord = ({
  event,
  previous,
  updatedAt
}: {
  event: DeploymentEvent;
  previous: DeploymentRecord | null;
  updatedAt: string;
}): DeploymentRecord => {
  const base = {service_id: event.service_id, version: event.version, updated_at: updatedAt};
  switch (event.event_type) {
    case 'deployment.started':
      return {
        ...base,
        status: 'deploying',
        ...(previous?.endpoint_url ? {endpoint_url: previous.endpoint_url} : {})
      };
    case 'deployment.succeeded':
      return {...base, status: 'deployed', ...(event.endpoint_url ? {endpoint_url: event.endpoint_url} : {})};
    case 'deployment.failed':
      return {...base, status: 'failed', error: event.error ?? 'Deployment failed'};
  }
};

export const createEndpointRegistry = ({
  store,
  urlTemplate,
  now = () => new Date()
}: {
  store: DeploymentStore;
  urlTemplate?: string;
  now?: () => Date;
}): EndpointRegistry => ({
  resolve: async coordinates => {
    const record = await store.get(coordinates);
    if (record) {
      return record.status === 'deployed' && record.endpoint_url ? record.endpoint_url : null;
    }

    return urlTemplate ? expandTemplate(urlTemplate, coordinates) : null;
  },
  get: coordinates => store.get(coordinates),
  applyEvent: async event => {
    const previous = await store.get({serviceId: event.service_id, version: event.version});
    const record = nextRecord({event, previous, updatedAt: now().toISOString()});
    await store.put(record);
    return record;
  }
});
