import { isMapping, type SettingsDocument } from './validators';

/**
 * Generic key-value settings accessor. Keys are dotted paths into nested
 * mappings (`cloud.aws.profile`).
 */
export interface SettingsSource {
  get(key: string, defaultValue?: unknown): unknown;
}

function snapshot(value: unknown): unknown {
  if (Array.isArray(value)) {
    return Object.freeze(value.map(snapshot));
  }
  if (isMapping(value) && Object.getPrototypeOf(value) === Object.prototype) {
    const copy: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      copy[key] = snapshot(entry);
    }
    return Object.freeze(copy);
  }
  return value;
}

/**
 * Immutable settings document. Plain objects and arrays are copied and
 * frozen; anything else (class instances, client factory functions) is kept
 * by reference.
 */
export class Settings implements SettingsSource {
  private readonly document: Readonly<Record<string, unknown>>;

  constructor(document: SettingsDocument = {}) {
    const frozen = snapshot(document);
    this.document = isMapping(frozen) ? frozen : {};
  }

  static empty(): Settings {
    return new Settings();
  }

  static fromObject(document: SettingsDocument): Settings {
    return new Settings(document);
  }

  get(key: string, defaultValue?: unknown): unknown {
    let current: unknown = this.document;
    for (const segment of key.split('.')) {
      if (!isMapping(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
        return defaultValue;
      }
      current = current[segment];
    }
    return current === undefined || current === null ? defaultValue : current;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  toObject(): Readonly<Record<string, unknown>> {
    return this.document;
  }
}
