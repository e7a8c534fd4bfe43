import { ResourceKind } from '../../src/types';
import { Settings } from '../../src/utils/settings';
import {
  AWSCloudService,
  AzureCloudService,
  CloudConfig,
  CustomCloudService,
  GCPCloudService,
  createCloudService,
} from '../../src/cloud/index';
import { probeProviders } from '../../src/cli';

function mockMissing(packageName: string): never {
  throw Object.assign(new Error(`Cannot find module '${packageName}'`), { code: 'MODULE_NOT_FOUND' });
}

jest.mock('@aws-sdk/client-s3', () => mockMissing('@aws-sdk/client-s3'));
jest.mock('@aws-sdk/client-sqs', () => mockMissing('@aws-sdk/client-sqs'));
jest.mock('@azure/storage-blob', () => mockMissing('@azure/storage-blob'));
jest.mock('@azure/service-bus', () => mockMissing('@azure/service-bus'));
jest.mock('@google-cloud/storage', () => mockMissing('@google-cloud/storage'));
jest.mock('ioredis', () => mockMissing('ioredis'));
jest.mock('minio', () => mockMissing('minio'));
jest.mock('amqp-connection-manager', () => mockMissing('amqp-connection-manager'));

function configFor(cloud: Record<string, unknown>): CloudConfig {
  return new CloudConfig(Settings.fromObject({ cloud }));
}

describe('Missing client libraries', () => {
  it('should return null instead of failing for AWS', () => {
    const service = createCloudService(configFor({
      provider: 'aws',
      aws: { profile: 'test-profile', s3: { bucket: 'assets' }, elasticache: { endpoint: 'cache.internal' } },
    }));

    expect(service).toBeInstanceOf(AWSCloudService);
    expect(service.getStorageClient()).toBeNull();
    expect(service.getCacheClient()).toBeNull();
    expect(service.getQueueClient()).toBeNull();
  });

  it('should return null instead of failing for Azure', () => {
    const service = createCloudService(configFor({
      provider: 'azure',
      azure: { connection_string: 'UseDevelopmentStorage=true' },
    }));

    expect(service.getStorageClient()).toBeNull();
    expect(service.getQueueClient()).toBeNull();
  });

  it('should return null instead of failing for GCP', () => {
    const service = createCloudService(configFor({
      provider: 'gcp',
      gcp: { memorystore: { instance: '10.0.0.3' } },
    }));

    expect(service.getStorageClient()).toBeNull();
    expect(service.getCacheClient()).toBeNull();
  });

  it('should return null for the custom fallbacks', () => {
    const service = createCloudService(configFor({
      provider: 'custom',
      custom: {
        storage: { type: 'minio' },
        cache: { type: 'redis' },
        queue: { type: 'rabbitmq' },
      },
    }));

    expect(service.getStorageClient()).toBeNull();
    expect(service.getCacheClient()).toBeNull();
    expect(service.getQueueClient()).toBeNull();
  });

  it('should still call custom factories', () => {
    const handle = { name: 'in-memory-cache' };
    const service = createCloudService(configFor({
      provider: 'custom',
      custom: { cache: { type: 'redis' }, cache_client_factory: () => handle },
    }));

    expect(service.getCacheClient()).toBe(handle);
  });

  it('should report the missing libraries as unavailable', () => {
    expect(AWSCloudService.isAvailable()).toBe(false);
    expect(AzureCloudService.isAvailable(ResourceKind.STORAGE)).toBe(false);
    expect(GCPCloudService.isAvailable(ResourceKind.STORAGE)).toBe(false);
    expect(CustomCloudService.isAvailable(ResourceKind.CACHE)).toBe(false);
  });

  it('should show the gaps in the probe table', () => {
    const aws = probeProviders().find((row) => row.provider === 'aws');
    const local = probeProviders().find((row) => row.provider === 'local');

    expect(aws).toEqual({ provider: 'aws', storage: false, cache: false, queue: false });
    expect(local).toEqual({ provider: 'local', storage: true, cache: true, queue: true });
  });
});
