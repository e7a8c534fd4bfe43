import { Settings } from '../../src/utils/settings';

describe('Settings', () => {
  const document = {
    cloud: {
      provider: 'aws',
      region: 'eu-west-1',
      aws: {
        profile: 'dev',
        s3: { bucket: 'assets' },
      },
      empty: null,
    },
    tags: ['a', 'b'],
  };

  describe('get()', () => {
    it('should resolve dotted paths into nested mappings', () => {
      const settings = new Settings(document);
      expect(settings.get('cloud.provider')).toBe('aws');
      expect(settings.get('cloud.aws.s3.bucket')).toBe('assets');
    });

    it('should return a nested mapping for a partial path', () => {
      const settings = new Settings(document);
      expect(settings.get('cloud.aws.s3')).toEqual({ bucket: 'assets' });
    });

    it('should return the default for a missing key', () => {
      const settings = new Settings(document);
      expect(settings.get('cloud.gcp.storage.bucket', 'fallback')).toBe('fallback');
      expect(settings.get('cloud.aws.role_arn')).toBeUndefined();
    });

    it('should return the default when the value is null', () => {
      const settings = new Settings(document);
      expect(settings.get('cloud.empty', 'fallback')).toBe('fallback');
    });

    it('should return the default when walking through a scalar', () => {
      const settings = new Settings(document);
      expect(settings.get('cloud.region.name', 'x')).toBe('x');
    });

    it('should not resolve inherited object properties', () => {
      const settings = new Settings(document);
      expect(settings.get('cloud.toString', 'none')).toBe('none');
    });
  });

  describe('immutability', () => {
    it('should not see later changes to the source document', () => {
      const source = { cloud: { provider: 'local' } };
      const settings = new Settings(source);
      source.cloud.provider = 'aws';
      expect(settings.get('cloud.provider')).toBe('local');
    });

    it('should freeze nested mappings and arrays', () => {
      const settings = new Settings(document);
      expect(Object.isFrozen(settings.get('cloud.aws'))).toBe(true);
      expect(Object.isFrozen(settings.get('tags'))).toBe(true);
    });

    it('should keep functions by reference', () => {
      const factory = (): object => ({});
      const settings = Settings.fromObject({ cloud: { custom: { storage_client_factory: factory } } });
      expect(settings.get('cloud.custom.storage_client_factory')).toBe(factory);
    });
  });

  describe('has()', () => {
    it('should report whether a key resolves to a value', () => {
      const settings = new Settings(document);
      expect(settings.has('cloud.aws.profile')).toBe(true);
      expect(settings.has('cloud.empty')).toBe(false);
      expect(settings.has('cloud.azure')).toBe(false);
    });
  });

  describe('empty()', () => {
    it('should build a settings source with no keys', () => {
      const settings = Settings.empty();
      expect(settings.toObject()).toEqual({});
      expect(settings.get('cloud.provider', 'local')).toBe('local');
    });
  });
});
