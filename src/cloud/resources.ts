import { CloudProvider, ResourceKind, type ResourceConfig } from '../types';
import { readMapping } from '../utils/validators';
import type { CloudConfig } from './config';

type FieldSource = (config: CloudConfig) => unknown;

interface ResourceMapping {
  type: string;
  fields: Record<string, FieldSource>;
}

type ManagedProvider = Exclude<CloudProvider, CloudProvider.CUSTOM | CloudProvider.LOCAL>;

export const LOCAL_RESOURCE: ResourceConfig = Object.freeze({ type: 'local' });

const setting = (key: string, fallback: unknown = null): FieldSource =>
  (config) => config.settings.get(key, fallback);

const region: FieldSource = (config) => config.region;
const projectId: FieldSource = (config) => config.projectId;

const firstOf = (...sources: FieldSource[]): FieldSource => (config) => {
  for (const source of sources) {
    const value = source(config);
    if (value !== null && value !== undefined) return value;
  }
  return null;
};

/**
 * Provider → resource kind → settings mapping. Adding a provider means adding
 * a row here; services only read the neutral field names.
 */
const RESOURCE_TABLE: Record<ResourceKind, Record<ManagedProvider, ResourceMapping>> = {
  [ResourceKind.STORAGE]: {
    [CloudProvider.AWS]: {
      type: 's3',
      fields: {
        bucket: setting('cloud.aws.s3.bucket'),
        region: firstOf(setting('cloud.aws.s3.region'), region),
      },
    },
    [CloudProvider.GCP]: {
      type: 'gcs',
      fields: {
        bucket: setting('cloud.gcp.storage.bucket'),
        projectId,
      },
    },
    [CloudProvider.AZURE]: {
      type: 'azure',
      fields: {
        container: setting('cloud.azure.storage.container'),
        accountName: setting('cloud.azure.storage.account_name'),
        connectionString: firstOf(
          setting('cloud.azure.storage.connection_string'),
          setting('cloud.azure.connection_string'),
        ),
      },
    },
    [CloudProvider.HETZNER]: {
      type: 'hetzner',
      fields: {
        storageBox: setting('cloud.hetzner.storage.box_id'),
        datacenter: setting('cloud.hetzner.datacenter', 'fsn1'),
        subdomain: setting('cloud.hetzner.storage.subdomain'),
      },
    },
  },
  [ResourceKind.CACHE]: {
    [CloudProvider.AWS]: {
      type: 'elasticache',
      fields: {
        endpoint: setting('cloud.aws.elasticache.endpoint'),
        port: setting('cloud.aws.elasticache.port', 6379),
      },
    },
    [CloudProvider.GCP]: {
      type: 'memorystore',
      fields: {
        instance: setting('cloud.gcp.memorystore.instance'),
        port: setting('cloud.gcp.memorystore.port', 6379),
        region,
      },
    },
    [CloudProvider.AZURE]: {
      type: 'cache',
      fields: {
        name: setting('cloud.azure.cache.name'),
        resourceGroup: setting('cloud.azure.resource_group'),
      },
    },
    // No managed cache at Hetzner; this describes a self-hosted Redis.
    [CloudProvider.HETZNER]: {
      type: 'redis',
      fields: {
        host: setting('cloud.hetzner.cache.host'),
        port: setting('cloud.hetzner.cache.port', 6379),
        password: setting('cloud.hetzner.cache.password'),
      },
    },
  },
  [ResourceKind.QUEUE]: {
    [CloudProvider.AWS]: {
      type: 'sqs',
      fields: {
        queueUrl: setting('cloud.aws.sqs.queue_url'),
        region: firstOf(setting('cloud.aws.sqs.region'), region),
      },
    },
    [CloudProvider.GCP]: {
      type: 'pubsub',
      fields: {
        topic: setting('cloud.gcp.pubsub.topic'),
        subscription: setting('cloud.gcp.pubsub.subscription'),
        projectId,
      },
    },
    [CloudProvider.AZURE]: {
      type: 'servicebus',
      fields: {
        namespace: setting('cloud.azure.servicebus.namespace'),
        queue: setting('cloud.azure.servicebus.queue'),
        connectionString: firstOf(
          setting('cloud.azure.servicebus.connection_string'),
          setting('cloud.azure.connection_string'),
        ),
      },
    },
    // Self-hosted RabbitMQ on Hetzner Cloud.
    [CloudProvider.HETZNER]: {
      type: 'rabbitmq',
      fields: {
        host: setting('cloud.hetzner.queue.host'),
        port: setting('cloud.hetzner.queue.port', 5672),
        username: setting('cloud.hetzner.queue.username', 'guest'),
        password: setting('cloud.hetzner.queue.password', 'guest'),
        vhost: setting('cloud.hetzner.queue.vhost', '/'),
      },
    },
  },
};

function isManagedProvider(provider: CloudProvider): provider is ManagedProvider {
  return provider !== CloudProvider.CUSTOM && provider !== CloudProvider.LOCAL;
}

export function deriveResourceConfig(config: CloudConfig, kind: ResourceKind): ResourceConfig {
  if (!config.isCloud && config.provider !== CloudProvider.CUSTOM) {
    return LOCAL_RESOURCE;
  }

  if (config.provider === CloudProvider.CUSTOM) {
    return Object.freeze(readMapping(config.settings.get(`cloud.custom.${kind}`, {})));
  }

  if (isManagedProvider(config.provider)) {
    const mapping = RESOURCE_TABLE[kind][config.provider];
    const derived: Record<string, unknown> = { type: mapping.type };
    for (const [field, source] of Object.entries(mapping.fields)) {
      derived[field] = source(config) ?? null;
    }
    return Object.freeze(derived);
  }

  return LOCAL_RESOURCE;
}
