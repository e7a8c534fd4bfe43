import { CloudProvider } from '../types';
import { BaseCloudService, NO_DEPENDENCIES, type ServiceDependencies } from './providers';

/** Dependency-free default: no backend, so every client is absent. */
export class LocalCloudService extends BaseCloudService {
  readonly provider = CloudProvider.LOCAL;

  static readonly dependencies: ServiceDependencies = NO_DEPENDENCIES;

  static isAvailable(): boolean {
    return true;
  }

  getStorageClient(): null {
    return null;
  }

  getCacheClient(): null {
    return null;
  }

  getQueueClient(): null {
    return null;
  }
}
