import { CloudProvider, ResourceKind } from '../types';
import { providerLog } from '../utils/logger';
import { readString } from '../utils/validators';
import { HetznerSession } from './hetzner-session';
import { BaseCloudService, NO_DEPENDENCIES, type ServiceDependencies } from './providers';

/**
 * Hetzner Cloud. Only Storage Boxes are reachable through the API; Hetzner
 * runs no managed cache or queue, so those always come back empty.
 */
export class HetznerCloudService extends BaseCloudService {
  readonly provider = CloudProvider.HETZNER;

  static readonly dependencies: ServiceDependencies = NO_DEPENDENCIES;

  static isAvailable(): boolean {
    return true;
  }

  getStorageClient(): HetznerSession | null {
    const hetzner = this.config.hetznerConfig;
    if (!hetzner) return null;
    const storage = this.matching(ResourceKind.STORAGE, this.config.getStorageConfig(), 'hetzner');
    if (!storage) return null;

    const apiToken = hetzner.apiToken;
    if (!apiToken) return this.incomplete(ResourceKind.STORAGE, 'cloud.hetzner.api_token');

    return this.construct(ResourceKind.STORAGE, () => new HetznerSession({
      apiToken,
      baseUrl: hetzner.apiUrl,
      storageBox: readString(storage.storageBox),
    }));
  }

  getCacheClient(): null {
    providerLog(this.provider, 'Hetzner has no managed cache service', 'debug');
    return null;
  }

  getQueueClient(): null {
    providerLog(this.provider, 'Hetzner has no managed queue service', 'debug');
    return null;
  }
}
