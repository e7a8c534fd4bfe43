import { z } from 'zod';
import { CloudProvider, type ClientFactory } from '../types';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const providerSchema = z.nativeEnum(CloudProvider);

export const settingsDocumentSchema = z.record(z.string(), z.unknown());

export type SettingsDocument = z.infer<typeof settingsDocumentSchema>;

export function isCloudProvider(value: unknown): value is CloudProvider {
  return providerSchema.safeParse(value).success;
}

/**
 * Parse a provider identifier from settings. Unknown identifiers abort
 * configuration loading.
 */
export function parseProvider(value: unknown, field = 'cloud.provider'): CloudProvider {
  const result = providerSchema.safeParse(value);
  if (!result.success) {
    const expected = Object.values(CloudProvider).join(', ');
    throw new ConfigurationError(
      `Invalid cloud provider "${String(value)}". Expected one of: ${expected}`,
      field,
      value,
    );
  }
  return result.data;
}

export function parseSettingsDocument(value: unknown, source: string): SettingsDocument {
  if (value === null || value === undefined) return {};
  const result = settingsDocumentSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(`Settings in ${source} must be a mapping`, source, value);
  }
  return result.data;
}

// ─── Field readers ───────────────────────────────────────────────────────────

export function isMapping(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(value: unknown): string | null {
  if (typeof value === 'string') return value.length > 0 ? value : null;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return null;
}

export function readNumber(value: unknown, fallback: number): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return fallback;
}

export function readBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase();
    if (['true', 'yes', '1', 'on'].includes(lowered)) return true;
    if (['false', 'no', '0', 'off'].includes(lowered)) return false;
  }
  return fallback;
}

export function readMapping(value: unknown): Readonly<Record<string, unknown>> {
  return isMapping(value) ? { ...value } : {};
}

export function isClientFactory(value: unknown): value is ClientFactory {
  return typeof value === 'function';
}
