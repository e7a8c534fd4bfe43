import type { BlobServiceClient } from '@azure/storage-blob';
import type { ServiceBusClient } from '@azure/service-bus';
import type { RedisManagementClient } from '@azure/arm-rediscache';
import { CloudProvider, ResourceKind } from '../types';
import { readString } from '../utils/validators';
import { AZURE_BLOB, AZURE_IDENTITY, AZURE_REDIS, AZURE_SERVICE_BUS } from './dependencies';
import { BaseCloudService, dependenciesAvailable, type ServiceDependencies } from './providers';

export class AzureCloudService extends BaseCloudService {
  readonly provider = CloudProvider.AZURE;

  static readonly dependencies: ServiceDependencies = {
    [ResourceKind.STORAGE]: [AZURE_BLOB],
    [ResourceKind.CACHE]: [AZURE_REDIS, AZURE_IDENTITY],
    [ResourceKind.QUEUE]: [AZURE_SERVICE_BUS],
  };

  static isAvailable(kind?: ResourceKind): boolean {
    return dependenciesAvailable(AzureCloudService.dependencies, kind);
  }

  getStorageClient(): BlobServiceClient | null {
    if (!this.config.azureConfig) return null;
    const storage = this.matching(ResourceKind.STORAGE, this.config.getStorageConfig(), 'azure');
    if (!storage) return null;

    const connectionString = readString(storage.connectionString);
    if (!connectionString) {
      return this.incomplete(ResourceKind.STORAGE, 'cloud.azure.connection_string');
    }

    const blob = AZURE_BLOB.load();
    if (!blob) return this.unavailable(ResourceKind.STORAGE, AZURE_BLOB);

    return this.construct(
      ResourceKind.STORAGE,
      () => blob.BlobServiceClient.fromConnectionString(connectionString),
    );
  }

  /** Management-plane client for Azure Cache for Redis, on ambient credentials. */
  getCacheClient(): RedisManagementClient | null {
    const azure = this.config.azureConfig;
    if (!azure) return null;
    if (!this.matching(ResourceKind.CACHE, this.config.getCacheConfig(), 'cache')) return null;

    const subscriptionId = azure.subscriptionId;
    if (!subscriptionId) {
      return this.incomplete(ResourceKind.CACHE, 'cloud.azure.subscription_id');
    }

    const redis = AZURE_REDIS.load();
    if (!redis) return this.unavailable(ResourceKind.CACHE, AZURE_REDIS);
    const identity = AZURE_IDENTITY.load();
    if (!identity) return this.unavailable(ResourceKind.CACHE, AZURE_IDENTITY);

    return this.construct(ResourceKind.CACHE, () => new redis.RedisManagementClient(
      new identity.DefaultAzureCredential(azure.tenantId ? { tenantId: azure.tenantId } : {}),
      subscriptionId,
    ));
  }

  getQueueClient(): ServiceBusClient | null {
    if (!this.config.azureConfig) return null;
    const queue = this.matching(ResourceKind.QUEUE, this.config.getQueueConfig(), 'servicebus');
    if (!queue) return null;

    const connectionString = readString(queue.connectionString);
    if (!connectionString) {
      return this.incomplete(ResourceKind.QUEUE, 'cloud.azure.connection_string');
    }

    const serviceBus = AZURE_SERVICE_BUS.load();
    if (!serviceBus) return this.unavailable(ResourceKind.QUEUE, AZURE_SERVICE_BUS);

    return this.construct(
      ResourceKind.QUEUE,
      () => new serviceBus.ServiceBusClient(connectionString),
    );
  }
}
