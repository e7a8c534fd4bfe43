import type { S3Client } from '@aws-sdk/client-s3';
import type { SQSClient } from '@aws-sdk/client-sqs';
import type { fromTemporaryCredentials } from '@aws-sdk/credential-providers';
import type { Redis } from 'ioredis';
import { CloudProvider, ResourceKind } from '../types';
import { readNumber, readString } from '../utils/validators';
import { DEFAULT_REGION } from './config';
import { AWS_CREDENTIALS, IOREDIS, S3_SDK, SQS_SDK } from './dependencies';
import { BaseCloudService, dependenciesAvailable, type ServiceDependencies } from './providers';

type AwsClientKind = ResourceKind.STORAGE | ResourceKind.QUEUE;

/** Shared by the S3 and SQS constructors; both accept this shape. */
export interface AwsClientParams {
  region: string;
  profile?: string;
  credentials?: ReturnType<typeof fromTemporaryCredentials>;
}

export class AWSCloudService extends BaseCloudService {
  readonly provider = CloudProvider.AWS;

  static readonly dependencies: ServiceDependencies = {
    [ResourceKind.STORAGE]: [S3_SDK],
    [ResourceKind.CACHE]: [IOREDIS],
    [ResourceKind.QUEUE]: [SQS_SDK],
  };

  static isAvailable(kind?: ResourceKind): boolean {
    return dependenciesAvailable(AWSCloudService.dependencies, kind);
  }

  /**
   * Region comes from the resource config when it names one, then from the
   * provider-wide region. The profile is left out when unset or when
   * `cloud.aws.skip_profile` is on.
   */
  getClientParams(kind: AwsClientKind): AwsClientParams {
    const aws = this.config.awsConfig;
    const resource = kind === ResourceKind.QUEUE
      ? this.config.getQueueConfig()
      : this.config.getStorageConfig();
    const params: AwsClientParams = {
      region: readString(resource.region) ?? aws?.region ?? DEFAULT_REGION,
    };

    if (aws?.profile && !aws.skipProfile) {
      params.profile = aws.profile;
    }

    if (aws?.roleArn) {
      const credentials = AWS_CREDENTIALS.load();
      if (credentials) {
        params.credentials = credentials.fromTemporaryCredentials({
          params: { RoleArn: aws.roleArn, RoleSessionName: 'cloudbridge' },
          clientConfig: { region: params.region },
          ...(params.profile ? { masterCredentials: credentials.fromIni({ profile: params.profile }) } : {}),
        });
      } else {
        this.unavailable(kind, AWS_CREDENTIALS);
      }
    }

    return params;
  }

  getStorageClient(): S3Client | null {
    if (!this.config.awsConfig) return null;
    const storage = this.matching(ResourceKind.STORAGE, this.config.getStorageConfig(), 's3');
    if (!storage) return null;

    const sdk = S3_SDK.load();
    if (!sdk) return this.unavailable(ResourceKind.STORAGE, S3_SDK);

    const params = this.getClientParams(ResourceKind.STORAGE);
    return this.construct(ResourceKind.STORAGE, () => new sdk.S3Client(params));
  }

  getCacheClient(): Redis | null {
    const cache = this.matching(ResourceKind.CACHE, this.config.getCacheConfig(), 'elasticache');
    if (!cache) return null;

    const endpoint = readString(cache.endpoint);
    if (!endpoint) return this.incomplete(ResourceKind.CACHE, 'cloud.aws.elasticache.endpoint');

    const ioredis = IOREDIS.load();
    if (!ioredis) return this.unavailable(ResourceKind.CACHE, IOREDIS);

    return this.construct(ResourceKind.CACHE, () => new ioredis.Redis({
      host: endpoint,
      port: readNumber(cache.port, 6379),
      lazyConnect: true,
    }));
  }

  getQueueClient(): SQSClient | null {
    if (!this.config.awsConfig) return null;
    const queue = this.matching(ResourceKind.QUEUE, this.config.getQueueConfig(), 'sqs');
    if (!queue) return null;

    const sdk = SQS_SDK.load();
    if (!sdk) return this.unavailable(ResourceKind.QUEUE, SQS_SDK);

    const params = this.getClientParams(ResourceKind.QUEUE);
    return this.construct(ResourceKind.QUEUE, () => new sdk.SQSClient(params));
  }
}
