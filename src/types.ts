/**
 * Core type definitions for the cloudbridge resource abstraction layer.
 * These types define the contracts between the resolver, the provider
 * services and their callers.
 */

// ─── Providers ───────────────────────────────────────────────────────────────

export enum CloudProvider {
  AWS = 'aws',
  AZURE = 'azure',
  GCP = 'gcp',
  HETZNER = 'hetzner',
  CUSTOM = 'custom',
  LOCAL = 'local',
}

// ─── Resource Kinds ──────────────────────────────────────────────────────────

export enum ResourceKind {
  STORAGE = 'storage',
  CACHE = 'cache',
  QUEUE = 'queue',
}

/**
 * Kind-specific configuration derived from a CloudConfig. Built-in providers
 * always set a `type` discriminator; custom provider mappings are passed
 * through as the caller wrote them and may not.
 */
export interface ResourceConfig {
  readonly type?: unknown;
  readonly [field: string]: unknown;
}

/** Opaque provider-native client. Never inspected after construction. */
export type ClientHandle = object;

/**
 * Caller-supplied constructor for a custom provider resource kind. Receives
 * the derived resource config and nothing else.
 */
export type ClientFactory = (config: ResourceConfig) => ClientHandle | null;

export type CustomProviderConfig = Readonly<Record<string, unknown>>;

// ─── Provider Views ──────────────────────────────────────────────────────────

export interface AwsConfigView {
  region: string;
  profile: string | null;
  roleArn: string | null;
  /** Leave the named profile out of client parameters (mocked AWS in tests). */
  skipProfile: boolean;
}

export interface GcpConfigView {
  projectId: string | null;
  region: string;
  credentialsPath: string | null;
}

export interface AzureConfigView {
  tenantId: string | null;
  subscriptionId: string | null;
  resourceGroup: string | null;
  connectionString: string | null;
}

export interface HetznerConfigView {
  apiToken: string | null;
  datacenter: string;
  projectId: string | null;
  apiUrl: string;
}

export interface LocalConfigView {
  storagePath: string;
}
