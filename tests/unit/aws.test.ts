import { S3Client } from '@aws-sdk/client-s3';
import { SQSClient } from '@aws-sdk/client-sqs';
import { fromIni, fromTemporaryCredentials } from '@aws-sdk/credential-providers';
import { Redis } from 'ioredis';
import { ResourceKind } from '../../src/types';
import { Settings } from '../../src/utils/settings';
import { CloudConfig } from '../../src/cloud/config';
import { AWSCloudService } from '../../src/cloud/aws';

jest.mock('@aws-sdk/client-s3', () => ({ S3Client: jest.fn() }));
jest.mock('@aws-sdk/client-sqs', () => ({ SQSClient: jest.fn() }));
jest.mock('@aws-sdk/credential-providers', () => ({
  fromTemporaryCredentials: jest.fn(() => 'temporary-credentials'),
  fromIni: jest.fn(() => 'ini-credentials'),
}));
jest.mock('ioredis', () => ({ Redis: jest.fn() }));

const ROLE_ARN = 'arn:aws:iam::123456789012:role/test-role';

function awsService(aws: Record<string, unknown>, region = 'us-west-2'): AWSCloudService {
  return new AWSCloudService(
    new CloudConfig(Settings.fromObject({ cloud: { provider: 'aws', region, aws } })),
  );
}

beforeEach(() => {
  jest.clearAllMocks();
});

describe('AWSCloudService', () => {
  describe('getStorageClient()', () => {
    it('should build an S3 client with region and profile', () => {
      const service = awsService({ profile: 'test-profile', s3: { bucket: 'assets' } });

      const client = service.getStorageClient();

      expect(client).toBeInstanceOf(S3Client);
      expect(S3Client).toHaveBeenCalledTimes(1);
      expect(S3Client).toHaveBeenCalledWith({ region: 'us-west-2', profile: 'test-profile' });
    });

    it('should leave the profile out when skip_profile is set', () => {
      const service = awsService({ profile: 'test-profile', skip_profile: true });

      service.getStorageClient();

      expect(S3Client).toHaveBeenCalledWith({ region: 'us-west-2' });
    });

    it('should use the bucket region over the provider region', () => {
      const service = awsService({ s3: { bucket: 'assets', region: 'eu-central-1' } });

      service.getStorageClient();

      expect(S3Client).toHaveBeenCalledWith({ region: 'eu-central-1' });
    });

    it('should assume the configured role on top of the profile', () => {
      const service = awsService({ profile: 'test-profile', role_arn: ROLE_ARN });

      service.getStorageClient();

      expect(fromIni).toHaveBeenCalledWith({ profile: 'test-profile' });
      expect(fromTemporaryCredentials).toHaveBeenCalledWith({
        params: { RoleArn: ROLE_ARN, RoleSessionName: 'cloudbridge' },
        clientConfig: { region: 'us-west-2' },
        masterCredentials: 'ini-credentials',
      });
      expect(S3Client).toHaveBeenCalledWith({
        region: 'us-west-2',
        profile: 'test-profile',
        credentials: 'temporary-credentials',
      });
    });

    it('should assume the role from ambient credentials without a profile', () => {
      const service = awsService({ role_arn: ROLE_ARN });

      service.getStorageClient();

      expect(fromIni).not.toHaveBeenCalled();
      expect(fromTemporaryCredentials).toHaveBeenCalledWith({
        params: { RoleArn: ROLE_ARN, RoleSessionName: 'cloudbridge' },
        clientConfig: { region: 'us-west-2' },
      });
    });

    it('should return null when the SDK constructor throws', () => {
      jest.mocked(S3Client).mockImplementationOnce(() => {
        throw new Error('invalid configuration');
      });
      const service = awsService({});

      expect(service.getStorageClient()).toBeNull();
    });

    it('should return null for a non-AWS config', () => {
      const service = new AWSCloudService(
        new CloudConfig(Settings.fromObject({ cloud: { provider: 'gcp' } })),
      );

      expect(service.getStorageClient()).toBeNull();
      expect(service.getQueueClient()).toBeNull();
      expect(service.getCacheClient()).toBeNull();
      expect(S3Client).not.toHaveBeenCalled();
    });
  });

  describe('getQueueClient()', () => {
    it('should build an SQS client with the queue region', () => {
      const service = awsService({ sqs: { queue_url: 'https://sqs.example/jobs', region: 'ap-southeast-2' } });

      const client = service.getQueueClient();

      expect(client).toBeInstanceOf(SQSClient);
      expect(SQSClient).toHaveBeenCalledWith({ region: 'ap-southeast-2' });
    });

    it('should share the profile handling with storage', () => {
      const service = awsService({ profile: 'test-profile' });

      service.getQueueClient();

      expect(SQSClient).toHaveBeenCalledWith({ region: 'us-west-2', profile: 'test-profile' });
    });
  });

  describe('getCacheClient()', () => {
    it('should build a lazily connecting Redis client for ElastiCache', () => {
      const service = awsService({ elasticache: { endpoint: 'cache.example.internal', port: 6380 } });

      const client = service.getCacheClient();

      expect(client).toBeInstanceOf(Redis);
      expect(Redis).toHaveBeenCalledWith({ host: 'cache.example.internal', port: 6380, lazyConnect: true });
    });

    it('should return null without an endpoint', () => {
      const service = awsService({});

      expect(service.getCacheClient()).toBeNull();
      expect(Redis).not.toHaveBeenCalled();
    });
  });

  describe('getClientParams()', () => {
    it('should fall back to us-east-1', () => {
      const service = new AWSCloudService(
        new CloudConfig(Settings.fromObject({ cloud: { provider: 'aws' } })),
      );

      expect(service.getClientParams(ResourceKind.STORAGE)).toEqual({ region: 'us-east-1' });
    });
  });

  describe('isAvailable()', () => {
    it('should report the installed SDKs', () => {
      expect(AWSCloudService.isAvailable()).toBe(true);
      expect(AWSCloudService.isAvailable(ResourceKind.CACHE)).toBe(true);
    });
  });
});
