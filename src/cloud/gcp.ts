import type { Storage } from '@google-cloud/storage';
import type { PubSub } from '@google-cloud/pubsub';
import type { Redis } from 'ioredis';
import { CloudProvider, ResourceKind } from '../types';
import { readNumber, readString } from '../utils/validators';
import { GCP_PUBSUB, GCP_STORAGE, IOREDIS } from './dependencies';
import { BaseCloudService, dependenciesAvailable, type ServiceDependencies } from './providers';

interface GcpClientOptions {
  projectId?: string;
  keyFilename?: string;
}

export class GCPCloudService extends BaseCloudService {
  readonly provider = CloudProvider.GCP;

  static readonly dependencies: ServiceDependencies = {
    [ResourceKind.STORAGE]: [GCP_STORAGE],
    [ResourceKind.CACHE]: [IOREDIS],
    [ResourceKind.QUEUE]: [GCP_PUBSUB],
  };

  static isAvailable(kind?: ResourceKind): boolean {
    return dependenciesAvailable(GCPCloudService.dependencies, kind);
  }

  private clientOptions(projectId: unknown): GcpClientOptions {
    const options: GcpClientOptions = {};
    const project = readString(projectId);
    if (project) options.projectId = project;
    const keyFilename = this.config.gcpConfig?.credentialsPath;
    if (keyFilename) options.keyFilename = keyFilename;
    return options;
  }

  getStorageClient(): Storage | null {
    const storage = this.matching(ResourceKind.STORAGE, this.config.getStorageConfig(), 'gcs');
    if (!storage) return null;

    const gcs = GCP_STORAGE.load();
    if (!gcs) return this.unavailable(ResourceKind.STORAGE, GCP_STORAGE);

    const options = this.clientOptions(storage.projectId);
    return this.construct(ResourceKind.STORAGE, () => new gcs.Storage(options));
  }

  /** Memorystore speaks the Redis protocol. */
  getCacheClient(): Redis | null {
    const cache = this.matching(ResourceKind.CACHE, this.config.getCacheConfig(), 'memorystore');
    if (!cache) return null;

    const host = readString(cache.instance);
    if (!host) return this.incomplete(ResourceKind.CACHE, 'cloud.gcp.memorystore.instance');

    const ioredis = IOREDIS.load();
    if (!ioredis) return this.unavailable(ResourceKind.CACHE, IOREDIS);

    return this.construct(ResourceKind.CACHE, () => new ioredis.Redis({
      host,
      port: readNumber(cache.port, 6379),
      lazyConnect: true,
    }));
  }

  getQueueClient(): PubSub | null {
    const queue = this.matching(ResourceKind.QUEUE, this.config.getQueueConfig(), 'pubsub');
    if (!queue) return null;

    const pubsub = GCP_PUBSUB.load();
    if (!pubsub) return this.unavailable(ResourceKind.QUEUE, GCP_PUBSUB);

    const options = this.clientOptions(queue.projectId);
    return this.construct(ResourceKind.QUEUE, () => new pubsub.PubSub(options));
  }
}
