import { CloudProvider, type ResourceKind } from '../types';
import { isCloudProvider } from '../utils/validators';
import { CloudConfig } from './config';
import { type CloudService, type ServiceDependencies } from './providers';
import { AWSCloudService } from './aws';
import { AzureCloudService } from './azure';
import { GCPCloudService } from './gcp';
import { HetznerCloudService } from './hetzner';
import { CustomCloudService } from './custom';
import { LocalCloudService } from './local';

export interface CloudServiceClass {
  new (config: CloudConfig): CloudService;
  readonly dependencies: ServiceDependencies;
  isAvailable(kind?: ResourceKind): boolean;
}

const SERVICES = {
  [CloudProvider.AWS]: AWSCloudService,
  [CloudProvider.AZURE]: AzureCloudService,
  [CloudProvider.GCP]: GCPCloudService,
  [CloudProvider.HETZNER]: HetznerCloudService,
  [CloudProvider.CUSTOM]: CustomCloudService,
  [CloudProvider.LOCAL]: LocalCloudService,
} satisfies Record<CloudProvider, CloudServiceClass>;

export function getServiceClass(provider: unknown): CloudServiceClass | null {
  return isCloudProvider(provider) ? SERVICES[provider] : null;
}

export function getAllServiceClasses(): Array<[CloudProvider, CloudServiceClass]> {
  return Object.values(CloudProvider).map(
    (provider): [CloudProvider, CloudServiceClass] => [provider, SERVICES[provider]],
  );
}

export class CloudServiceProvider {
  /** Service for the configured provider, or null when it is not recognized. */
  static getCloudService(config: CloudConfig): CloudService | null {
    const ServiceClass = getServiceClass(config.provider);
    return ServiceClass ? new ServiceClass(config) : null;
  }

  /**
   * Never fails: an unrecognized provider, or no config at all, gets the
   * local service. A new instance is returned on every call.
   */
  static createService(config?: CloudConfig | null): CloudService {
    const bound = config ?? CloudConfig.local();
    return CloudServiceProvider.getCloudService(bound) ?? new LocalCloudService(bound);
  }
}

export function createCloudService(config?: CloudConfig | null): CloudService {
  return CloudServiceProvider.createService(config);
}

export type { CloudService, ServiceDependencies } from './providers';
export { BaseCloudService } from './providers';
export { CloudConfig } from './config';
export { OptionalDependency } from './dependencies';
export { HetznerSession, HetznerApiError } from './hetzner-session';
export { AWSCloudService } from './aws';
export { AzureCloudService } from './azure';
export { GCPCloudService } from './gcp';
export { HetznerCloudService } from './hetzner';
export { CustomCloudService, parseEndpoint } from './custom';
export { LocalCloudService } from './local';
