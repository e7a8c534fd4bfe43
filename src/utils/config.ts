import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'yaml';
import { CloudProvider } from '../types';
import { Settings } from './settings';
import { isMapping, parseSettingsDocument, type SettingsDocument } from './validators';

export const CONFIG_FILE_NAMES = [
  'cloudbridge.config.yaml',
  'cloudbridge.config.yml',
  'cloudbridge.config.json',
  '.cloudbridgerc',
];

export const ENV_PREFIX = 'CLOUDBRIDGE_';
const ENV_SEPARATOR = '__';
const RESERVED_ENV_KEYS = new Set(['CLOUDBRIDGE_LOG_LEVEL']);

const STARTER_CLOUD_BLOCKS: Record<CloudProvider, SettingsDocument> = {
  [CloudProvider.AWS]: {
    profile: null,
    role_arn: null,
    skip_profile: false,
    s3: { bucket: 'app-data', region: null },
    elasticache: { endpoint: null, port: 6379 },
    sqs: { queue_url: null, region: null },
  },
  [CloudProvider.AZURE]: {
    subscription_id: null,
    resource_group: null,
    connection_string: null,
    storage: { container: 'app-data', account_name: null },
    cache: { name: null },
    servicebus: { namespace: null, queue: null },
  },
  [CloudProvider.GCP]: {
    credentials_path: null,
    storage: { bucket: 'app-data' },
    memorystore: { instance: null, port: 6379 },
    pubsub: { topic: null, subscription: null },
  },
  [CloudProvider.HETZNER]: {
    api_token: null,
    datacenter: 'fsn1',
    project_id: null,
    storage: { box_id: null, subdomain: null },
    cache: { host: null, port: 6379, password: null },
    queue: { host: null, port: 5672, username: 'guest', password: 'guest', vhost: '/' },
  },
  [CloudProvider.CUSTOM]: {
    storage: { type: 'minio', endpoint: 'localhost:9000', access_key: 'minioadmin', secret_key: 'minioadmin', secure: false },
    cache: { type: 'redis', host: 'localhost', port: 6379, db: 0 },
    queue: { type: 'rabbitmq', host: 'localhost', port: 5672, username: 'guest', password: 'guest', vhost: '/' },
  },
  [CloudProvider.LOCAL]: {
    storage_path: 'local_storage',
  },
};

export function loadSettings(projectPath: string, env: NodeJS.ProcessEnv = process.env): Settings {
  for (const fileName of CONFIG_FILE_NAMES) {
    const filePath = path.join(projectPath, fileName);
    if (fs.existsSync(filePath)) {
      return loadSettingsFile(filePath, env);
    }
  }
  return new Settings(applyEnvOverrides({}, env));
}

export function loadSettingsFile(filePath: string, env: NodeJS.ProcessEnv = process.env): Settings {
  const content = fs.readFileSync(filePath, 'utf-8');
  const parsed: unknown = filePath.endsWith('.json')
    ? JSON.parse(content)
    : yaml.parse(content);
  const document = parseSettingsDocument(parsed, filePath);
  return new Settings(applyEnvOverrides(document, env));
}

/**
 * `CLOUDBRIDGE_CLOUD__AWS__PROFILE=dev` sets `cloud.aws.profile`. Values are
 * read as YAML scalars so numbers and booleans keep their type.
 */
export function applyEnvOverrides(
  document: SettingsDocument,
  env: NodeJS.ProcessEnv,
): SettingsDocument {
  const result = deepCopy(document);
  const names = Object.keys(env)
    .filter((name) => name.startsWith(ENV_PREFIX) && !RESERVED_ENV_KEYS.has(name))
    .sort();

  for (const name of names) {
    const raw = env[name];
    if (raw === undefined) continue;
    const segments = name
      .slice(ENV_PREFIX.length)
      .split(ENV_SEPARATOR)
      .map((segment) => segment.toLowerCase())
      .filter((segment) => segment.length > 0);
    if (segments.length === 0) continue;
    setPath(result, segments, parseEnvValue(raw));
  }
  return result;
}

function parseEnvValue(raw: string): unknown {
  try {
    const value: unknown = yaml.parse(raw);
    return isMapping(value) || Array.isArray(value) ? raw : value;
  } catch {
    return raw;
  }
}

function setPath(target: Record<string, unknown>, segments: string[], value: unknown): void {
  let current = target;
  for (const segment of segments.slice(0, -1)) {
    const next = current[segment];
    if (isMapping(next)) {
      const copy = { ...next };
      current[segment] = copy;
      current = copy;
    } else {
      const created: Record<string, unknown> = {};
      current[segment] = created;
      current = created;
    }
  }
  current[segments[segments.length - 1]] = value;
}

function deepCopy(document: SettingsDocument): Record<string, unknown> {
  const copy: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(document)) {
    copy[key] = isMapping(value) && Object.getPrototypeOf(value) === Object.prototype
      ? deepCopy(value)
      : value;
  }
  return copy;
}

export function getDefaultSettings(provider: CloudProvider = CloudProvider.LOCAL): SettingsDocument {
  const cloud: Record<string, unknown> = {
    provider,
    region: provider === CloudProvider.HETZNER ? 'eu-central' : 'us-east-1',
  };
  if (provider === CloudProvider.GCP) cloud.project_id = null;
  if (provider === CloudProvider.AZURE) cloud.tenant_id = null;
  cloud[provider] = deepCopy(STARTER_CLOUD_BLOCKS[provider]);
  return { cloud };
}

export function saveSettings(projectPath: string, document: SettingsDocument): string {
  const filePath = path.join(projectPath, CONFIG_FILE_NAMES[0]);
  const content = yaml.stringify(document);
  fs.writeFileSync(filePath, content, 'utf-8');
  return filePath;
}
