import fs from 'node:fs/promises';
import path from 'node:path';
import YAML from 'yaml';
import { ConfigLoadError, describeError } from '../errors.js';
import type { ConfigMapping, ConfigValue } from '../types.js';

export interface ConfigLoadResult {
  filePath: string;
  loaded: ConfigMapping;
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isConfigValue(value: unknown): value is ConfigValue {
  if (typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function copyValue(value: ConfigValue): ConfigValue {
  return Array.isArray(value) ? [...value] : value;
}

function parseDocument(filePath: string, content: string): unknown {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === '.yaml' || extension === '.yml') {
    return YAML.parse(content);
  }
  return JSON.parse(content);
}

/**
 * Validates a parsed document as a flat property mapping and returns a detached copy.
 */
export function toConfigMapping(filePath: string, document: unknown): ConfigMapping {
  if (!isObjectRecord(document) || Array.isArray(document)) {
    throw new ConfigLoadError(filePath, 'Configuration must be an object');
  }

  const mapping: ConfigMapping = {};
  for (const [key, value] of Object.entries(document)) {
    if (!isConfigValue(value)) {
      throw new ConfigLoadError(
        filePath,
        `Unsupported value for "${key}": expected a string, number, boolean or list of strings`,
      );
    }
    // defineProperty keeps keys such as `__proto__` as plain entries
    Object.defineProperty(mapping, key, { value: copyValue(value), enumerable: true, writable: true, configurable: true });
  }
  return mapping;
}

/**
 * Client properties merged from every loaded file.
 *
 * Merging is a shallow override: a key present in the new source replaces the
 * previous value, keys absent from it are kept.
 */
export class ConfigStore {
  private readonly values = new Map<string, ConfigValue>();

  get size(): number {
    return this.values.size;
  }

  isEmpty(): boolean {
    return this.values.size === 0;
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  get(key: string): ConfigValue | undefined {
    return this.values.get(key);
  }

  set(key: string, value: ConfigValue): void {
    this.values.set(key, copyValue(value));
  }

  merge(source: Readonly<ConfigMapping>): void {
    for (const [key, value] of Object.entries(source)) {
      this.set(key, value);
    }
  }

  describe(): Array<[string, ConfigValue]> {
    return [...this.values.entries()].map(([key, value]) => [key, copyValue(value)]);
  }

  snapshot(): ConfigMapping {
    return Object.fromEntries(this.describe());
  }

  /**
   * Loads a JSON (or YAML) document and merges it. Nothing is merged unless the
   * whole document is valid.
   */
  async load(filePath: string): Promise<ConfigLoadResult> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw new ConfigLoadError(filePath, `Could not load file: ${filePath}`, error);
    }

    let document: unknown;
    try {
      document = parseDocument(filePath, content);
    } catch (error) {
      throw new ConfigLoadError(filePath, `Could not parse file: ${filePath} (${describeError(error)})`, error);
    }

    const loaded = toConfigMapping(filePath, document);
    this.merge(loaded);
    return { filePath, loaded };
  }
}
