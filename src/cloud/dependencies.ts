import type * as S3 from '@aws-sdk/client-s3';
import type * as SQS from '@aws-sdk/client-sqs';
import type * as AwsCredentials from '@aws-sdk/credential-providers';
import type * as AzureBlob from '@azure/storage-blob';
import type * as AzureServiceBus from '@azure/service-bus';
import type * as AzureIdentity from '@azure/identity';
import type * as AzureRedis from '@azure/arm-rediscache';
import type * as GcpStorage from '@google-cloud/storage';
import type * as GcpPubSub from '@google-cloud/pubsub';
import type * as IORedis from 'ioredis';
import type * as Minio from 'minio';
import type * as AmqpManager from 'amqp-connection-manager';
import logger from '../utils/logger';

function isModuleNotFound(error: unknown, packageName: string): boolean {
  if (!(error instanceof Error) || !('code' in error)) return false;
  // Only the first line names the module; the require stack follows it.
  const [firstLine] = error.message.split('\n');
  return error.code === 'MODULE_NOT_FOUND' && firstLine === `Cannot find module '${packageName}'`;
}

/**
 * A client library the application may run without. The first `load()` or
 * `isAvailable()` probes the package; the outcome is kept for the life of the
 * process.
 */
export class OptionalDependency<T> {
  private probed = false;
  private module: T | null = null;

  constructor(
    readonly packageName: string,
    private readonly loader: () => T,
  ) {}

  isAvailable(): boolean {
    return this.load() !== null;
  }

  load(): T | null {
    if (this.probed) return this.module;
    try {
      this.module = this.loader();
    } catch (error) {
      if (!isModuleNotFound(error, this.packageName)) throw error;
      logger.debug(`Optional dependency "${this.packageName}" is not installed`);
      this.module = null;
    }
    this.probed = true;
    return this.module;
  }
}

export const S3_SDK = new OptionalDependency(
  '@aws-sdk/client-s3',
  (): typeof S3 => require('@aws-sdk/client-s3'),
);

export const SQS_SDK = new OptionalDependency(
  '@aws-sdk/client-sqs',
  (): typeof SQS => require('@aws-sdk/client-sqs'),
);

export const AWS_CREDENTIALS = new OptionalDependency(
  '@aws-sdk/credential-providers',
  (): typeof AwsCredentials => require('@aws-sdk/credential-providers'),
);

export const AZURE_BLOB = new OptionalDependency(
  '@azure/storage-blob',
  (): typeof AzureBlob => require('@azure/storage-blob'),
);

export const AZURE_SERVICE_BUS = new OptionalDependency(
  '@azure/service-bus',
  (): typeof AzureServiceBus => require('@azure/service-bus'),
);

export const AZURE_IDENTITY = new OptionalDependency(
  '@azure/identity',
  (): typeof AzureIdentity => require('@azure/identity'),
);

export const AZURE_REDIS = new OptionalDependency(
  '@azure/arm-rediscache',
  (): typeof AzureRedis => require('@azure/arm-rediscache'),
);

export const GCP_STORAGE = new OptionalDependency(
  '@google-cloud/storage',
  (): typeof GcpStorage => require('@google-cloud/storage'),
);

export const GCP_PUBSUB = new OptionalDependency(
  '@google-cloud/pubsub',
  (): typeof GcpPubSub => require('@google-cloud/pubsub'),
);

export const IOREDIS = new OptionalDependency(
  'ioredis',
  (): typeof IORedis => require('ioredis'),
);

export const MINIO = new OptionalDependency(
  'minio',
  (): typeof Minio => require('minio'),
);

export const AMQP = new OptionalDependency(
  'amqp-connection-manager',
  (): typeof AmqpManager => require('amqp-connection-manager'),
);
