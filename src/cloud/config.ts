import {
  CloudProvider,
  ResourceKind,
  type AwsConfigView,
  type AzureConfigView,
  type CustomProviderConfig,
  type GcpConfigView,
  type HetznerConfigView,
  type LocalConfigView,
  type ResourceConfig,
} from '../types';
import { Settings, type SettingsSource } from '../utils/settings';
import {
  parseProvider,
  readBoolean,
  readMapping,
  readString,
} from '../utils/validators';
import { deriveResourceConfig } from './resources';

export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_HETZNER_DATACENTER = 'fsn1';
export const DEFAULT_HETZNER_API_URL = 'https://api.hetzner.cloud/v1';

/**
 * Resolved cloud configuration. Built once from a settings source; the
 * provider is validated up front and provider views are only populated for
 * the active provider.
 */
export class CloudConfig {
  readonly provider: CloudProvider;
  readonly region: string;
  readonly projectId: string | null;
  readonly tenantId: string | null;
  readonly customConfig: CustomProviderConfig;

  constructor(readonly settings: SettingsSource) {
    this.provider = parseProvider(settings.get('cloud.provider', CloudProvider.LOCAL));
    this.region = readString(settings.get('cloud.region', DEFAULT_REGION)) ?? DEFAULT_REGION;
    this.projectId = readString(settings.get('cloud.project_id'));
    this.tenantId = readString(settings.get('cloud.tenant_id'));
    this.customConfig = Object.freeze(readMapping(settings.get('cloud.custom', {})));
  }

  static local(): CloudConfig {
    return new CloudConfig(Settings.empty());
  }

  /** Local and custom setups have no managed backend. */
  get isCloud(): boolean {
    return this.provider !== CloudProvider.LOCAL && this.provider !== CloudProvider.CUSTOM;
  }

  get awsConfig(): AwsConfigView | null {
    if (this.provider !== CloudProvider.AWS) return null;
    return {
      region: this.region,
      profile: this.read('cloud.aws.profile'),
      roleArn: this.read('cloud.aws.role_arn'),
      skipProfile: readBoolean(this.settings.get('cloud.aws.skip_profile'), false),
    };
  }

  get gcpConfig(): GcpConfigView | null {
    if (this.provider !== CloudProvider.GCP) return null;
    return {
      projectId: this.projectId,
      region: this.region,
      credentialsPath: this.read('cloud.gcp.credentials_path'),
    };
  }

  get azureConfig(): AzureConfigView | null {
    if (this.provider !== CloudProvider.AZURE) return null;
    return {
      tenantId: this.tenantId,
      subscriptionId: this.read('cloud.azure.subscription_id'),
      resourceGroup: this.read('cloud.azure.resource_group'),
      connectionString: this.read('cloud.azure.connection_string'),
    };
  }

  get hetznerConfig(): HetznerConfigView | null {
    if (this.provider !== CloudProvider.HETZNER) return null;
    return {
      apiToken: this.read('cloud.hetzner.api_token'),
      datacenter: this.read('cloud.hetzner.datacenter') ?? DEFAULT_HETZNER_DATACENTER,
      projectId: this.read('cloud.hetzner.project_id'),
      apiUrl: this.read('cloud.hetzner.api_url') ?? DEFAULT_HETZNER_API_URL,
    };
  }

  get customProviderConfig(): CustomProviderConfig | null {
    if (this.provider !== CloudProvider.CUSTOM) return null;
    return this.customConfig;
  }

  get localConfig(): LocalConfigView | null {
    if (this.provider !== CloudProvider.LOCAL) return null;
    return {
      storagePath: this.read('cloud.local.storage_path') ?? 'local_storage',
    };
  }

  getStorageConfig(): ResourceConfig {
    return deriveResourceConfig(this, ResourceKind.STORAGE);
  }

  getCacheConfig(): ResourceConfig {
    return deriveResourceConfig(this, ResourceKind.CACHE);
  }

  getQueueConfig(): ResourceConfig {
    return deriveResourceConfig(this, ResourceKind.QUEUE);
  }

  getResourceConfig(kind: ResourceKind): ResourceConfig {
    return deriveResourceConfig(this, kind);
  }

  private read(key: string): string | null {
    return readString(this.settings.get(key));
  }
}
