import type { Client as MinioClient } from 'minio';
import type { Redis } from 'ioredis';
import type { AmqpConnectionManager } from 'amqp-connection-manager';
import {
  CloudProvider,
  ResourceKind,
  type ClientFactory,
  type ClientHandle,
  type ResourceConfig,
} from '../types';
import { providerLog } from '../utils/logger';
import { isClientFactory, readBoolean, readNumber, readString } from '../utils/validators';
import { AMQP, IOREDIS, MINIO } from './dependencies';
import { BaseCloudService, dependenciesAvailable, type ServiceDependencies } from './providers';

interface ParsedEndpoint {
  host: string;
  port?: number;
  secure?: boolean;
}

/** Accepts `host`, `host:port` or a full `http(s)://host:port` URL. */
export function parseEndpoint(endpoint: string): ParsedEndpoint {
  const scheme = endpoint.match(/^(https?):\/\//i);
  const secure = scheme ? scheme[1].toLowerCase() === 'https' : undefined;
  const rest = (scheme ? endpoint.slice(scheme[0].length) : endpoint).replace(/\/.*$/, '');
  const separator = rest.lastIndexOf(':');
  if (separator > 0) {
    const port = Number(rest.slice(separator + 1));
    if (Number.isInteger(port) && port > 0) {
      return { host: rest.slice(0, separator), port, secure };
    }
  }
  return { host: rest, secure };
}

/**
 * Self-hosted or otherwise unlisted infrastructure. Each resource kind can be
 * built by a factory function placed in `cloud.custom.<kind>_client_factory`;
 * without one, MinIO, Redis and RabbitMQ are supported by `type`.
 */
export class CustomCloudService extends BaseCloudService {
  readonly provider = CloudProvider.CUSTOM;

  static readonly dependencies: ServiceDependencies = {
    [ResourceKind.STORAGE]: [MINIO],
    [ResourceKind.CACHE]: [IOREDIS],
    [ResourceKind.QUEUE]: [AMQP],
  };

  static isAvailable(kind?: ResourceKind): boolean {
    return dependenciesAvailable(CustomCloudService.dependencies, kind);
  }

  getFactory(kind: ResourceKind): ClientFactory | null {
    const custom = this.config.customProviderConfig ?? this.config.customConfig;
    const factory = custom[`${kind}_client_factory`];
    return isClientFactory(factory) ? factory : null;
  }

  getStorageClient(): ClientHandle | null {
    const storage = this.config.getStorageConfig();
    const factory = this.getFactory(ResourceKind.STORAGE);
    if (factory) return factory(storage);

    if (!this.matching(ResourceKind.STORAGE, storage, 's3', 'minio')) return null;
    return this.createMinioClient(storage);
  }

  getCacheClient(): ClientHandle | null {
    const cache = this.config.getCacheConfig();
    const factory = this.getFactory(ResourceKind.CACHE);
    if (factory) return factory(cache);

    if (!this.matching(ResourceKind.CACHE, cache, 'redis')) return null;
    return this.createRedisClient(cache);
  }

  getQueueClient(): ClientHandle | null {
    const queue = this.config.getQueueConfig();
    const factory = this.getFactory(ResourceKind.QUEUE);
    if (factory) return factory(queue);

    if (!this.matching(ResourceKind.QUEUE, queue, 'rabbitmq')) return null;
    return this.createRabbitMqConnection(queue);
  }

  private createMinioClient(storage: ResourceConfig): MinioClient | null {
    const minio = MINIO.load();
    if (!minio) return this.unavailable(ResourceKind.STORAGE, MINIO);

    const endpoint = parseEndpoint(readString(storage.endpoint) ?? 'localhost:9000');
    const useSSL = readBoolean(storage.secure, endpoint.secure ?? false);
    const region = readString(storage.region);
    return this.construct(ResourceKind.STORAGE, () => new minio.Client({
      endPoint: endpoint.host,
      port: endpoint.port,
      useSSL,
      accessKey: readString(storage.access_key) ?? 'minioadmin',
      secretKey: readString(storage.secret_key) ?? 'minioadmin',
      ...(region ? { region } : {}),
    }));
  }

  private createRedisClient(cache: ResourceConfig): Redis | null {
    const ioredis = IOREDIS.load();
    if (!ioredis) return this.unavailable(ResourceKind.CACHE, IOREDIS);

    const password = readString(cache.password);
    const useTls = readBoolean(cache.ssl, false);
    return this.construct(ResourceKind.CACHE, () => new ioredis.Redis({
      host: readString(cache.host) ?? 'localhost',
      port: readNumber(cache.port, 6379),
      db: readNumber(cache.db, 0),
      ...(password ? { password } : {}),
      ...(useTls ? { tls: {} } : {}),
      lazyConnect: true,
    }));
  }

  /**
   * Returns the connection manager rather than a channel so the caller owns
   * both channel creation and shutdown.
   */
  private createRabbitMqConnection(queue: ResourceConfig): AmqpConnectionManager | null {
    const amqp = AMQP.load();
    if (!amqp) return this.unavailable(ResourceKind.QUEUE, AMQP);

    const host = readString(queue.host) ?? 'localhost';
    const useTls = readBoolean(queue.ssl, false);
    providerLog(this.provider, `Connecting to RabbitMQ at ${host}`, 'debug');
    return this.construct(ResourceKind.QUEUE, () => amqp.connect([{
      protocol: useTls ? 'amqps' : 'amqp',
      hostname: host,
      port: readNumber(queue.port, 5672),
      username: readString(queue.username) ?? 'guest',
      password: readString(queue.password) ?? 'guest',
      vhost: readString(queue.vhost) ?? '/',
    }]));
  }
}
