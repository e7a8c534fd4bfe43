import { CloudProvider, ResourceKind } from '../../src/types';
import { Settings } from '../../src/utils/settings';
import {
  AWSCloudService,
  AzureCloudService,
  CloudConfig,
  CloudServiceProvider,
  CustomCloudService,
  GCPCloudService,
  HetznerCloudService,
  LocalCloudService,
  createCloudService,
  getAllServiceClasses,
  getServiceClass,
  type CloudServiceClass,
} from '../../src/cloud/index';

function configFor(provider: string): CloudConfig {
  return new CloudConfig(Settings.fromObject({ cloud: { provider } }));
}

function withUnknownProvider(): CloudConfig {
  const config = configFor('local');
  Object.defineProperty(config, 'provider', { value: 'digitalocean' });
  return config;
}

describe('CloudServiceProvider', () => {
  describe('createService()', () => {
    const expected: Array<[string, CloudServiceClass]> = [
      ['aws', AWSCloudService],
      ['azure', AzureCloudService],
      ['gcp', GCPCloudService],
      ['hetzner', HetznerCloudService],
      ['custom', CustomCloudService],
      ['local', LocalCloudService],
    ];

    it.each(expected)('should build the %s service', (provider, ServiceClass) => {
      const config = configFor(provider);
      const service = CloudServiceProvider.createService(config);
      expect(service).toBeInstanceOf(ServiceClass);
      expect(service.config).toBe(config);
    });

    it('should fall back to the local service without a config', () => {
      const service = CloudServiceProvider.createService();
      expect(service).toBeInstanceOf(LocalCloudService);
      expect(service.config.provider).toBe(CloudProvider.LOCAL);
    });

    it('should fall back to the local service for null', () => {
      expect(CloudServiceProvider.createService(null)).toBeInstanceOf(LocalCloudService);
    });

    it('should fall back to the local service for an unrecognized provider', () => {
      const config = withUnknownProvider();
      const service = CloudServiceProvider.createService(config);
      expect(service).toBeInstanceOf(LocalCloudService);
      expect(service.config).toBe(config);
    });

    it('should return a new instance on every call', () => {
      const config = configFor('aws');
      expect(CloudServiceProvider.createService(config)).not.toBe(CloudServiceProvider.createService(config));
    });
  });

  describe('getCloudService()', () => {
    it('should return null for an unrecognized provider', () => {
      expect(CloudServiceProvider.getCloudService(withUnknownProvider())).toBeNull();
    });

    it('should return the matching service otherwise', () => {
      expect(CloudServiceProvider.getCloudService(configFor('gcp'))).toBeInstanceOf(GCPCloudService);
    });
  });

  describe('createCloudService()', () => {
    it('should delegate to the provider factory', () => {
      expect(createCloudService(configFor('azure'))).toBeInstanceOf(AzureCloudService);
      expect(createCloudService()).toBeInstanceOf(LocalCloudService);
    });
  });

  describe('service registry', () => {
    it('should resolve service classes by identifier', () => {
      expect(getServiceClass('hetzner')).toBe(HetznerCloudService);
      expect(getServiceClass('regional')).toBeNull();
    });

    it('should list every provider once', () => {
      const providers = getAllServiceClasses().map(([provider]) => provider);
      expect(providers).toEqual(Object.values(CloudProvider));
    });

    it('should report dependency-free providers as always available', () => {
      expect(LocalCloudService.isAvailable()).toBe(true);
      expect(HetznerCloudService.isAvailable()).toBe(true);
      expect(LocalCloudService.dependencies[ResourceKind.STORAGE]).toEqual([]);
    });
  });
});

describe('LocalCloudService', () => {
  it('should return null for every client kind', () => {
    const service = new LocalCloudService(CloudConfig.local());
    expect(service.getStorageClient()).toBeNull();
    expect(service.getCacheClient()).toBeNull();
    expect(service.getQueueClient()).toBeNull();
  });

  it('should return null even when bound to a cloud config', () => {
    const service = new LocalCloudService(configFor('aws'));
    expect(service.getStorageClient()).toBeNull();
  });
});
