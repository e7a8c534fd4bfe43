import { type CloudProvider, ResourceKind, type ClientHandle, type ResourceConfig } from '../types';
import { providerLog } from '../utils/logger';
import type { CloudConfig } from './config';
import type { OptionalDependency } from './dependencies';

/**
 * Capability contract every provider satisfies. Callers branch only on
 * whether a handle came back, never on the provider behind it.
 */
export interface CloudService {
  readonly config: CloudConfig;
  getStorageClient(): ClientHandle | null;
  getCacheClient(): ClientHandle | null;
  getQueueClient(): ClientHandle | null;
}

export type ServiceDependencies = Readonly<Record<ResourceKind, readonly OptionalDependency<unknown>[]>>;

export const NO_DEPENDENCIES: ServiceDependencies = {
  [ResourceKind.STORAGE]: [],
  [ResourceKind.CACHE]: [],
  [ResourceKind.QUEUE]: [],
};

export function dependenciesAvailable(
  dependencies: ServiceDependencies,
  kind?: ResourceKind,
): boolean {
  const kinds = kind ? [kind] : Object.values(ResourceKind);
  return kinds.every((k) => dependencies[k].every((dependency) => dependency.isAvailable()));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export abstract class BaseCloudService implements CloudService {
  abstract readonly provider: CloudProvider;

  constructor(readonly config: CloudConfig) {}

  abstract getStorageClient(): ClientHandle | null;
  abstract getCacheClient(): ClientHandle | null;
  abstract getQueueClient(): ClientHandle | null;

  /**
   * Checks the derived config's `type` against what this provider builds.
   * Returns the config on a match, otherwise null.
   */
  protected matching(kind: ResourceKind, config: ResourceConfig, ...types: string[]): ResourceConfig | null {
    if (typeof config.type === 'string' && types.includes(config.type)) return config;
    providerLog(
      this.provider,
      `No ${kind} client: config type "${String(config.type)}" is not one of ${types.join(', ')}`,
      'debug',
    );
    return null;
  }

  protected unavailable(kind: ResourceKind, dependency: OptionalDependency<unknown>): null {
    providerLog(
      this.provider,
      `No ${kind} client: package "${dependency.packageName}" is not installed`,
      'warn',
    );
    return null;
  }

  protected incomplete(kind: ResourceKind, missing: string): null {
    providerLog(this.provider, `No ${kind} client: ${missing} is not configured`, 'warn');
    return null;
  }

  /** Built-in constructors that throw are reported as absence. */
  protected construct<T extends ClientHandle>(kind: ResourceKind, build: () => T): T | null {
    try {
      const client = build();
      providerLog(this.provider, `Created ${kind} client`, 'debug');
      return client;
    } catch (error) {
      providerLog(this.provider, `Failed to create ${kind} client: ${errorMessage(error)}`, 'warn');
      return null;
    }
  }
}
