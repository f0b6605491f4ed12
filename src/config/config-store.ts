import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { JsonObject, JsonValue } from '../types/index.js';
import type { ConfigStore } from './types.js';

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Nested JSON document addressed by dotted keys. Kept in memory until `save`.
 */
export class MemoryConfigStore implements ConfigStore {
  protected data: JsonObject;

  constructor(initial: JsonObject = {}) {
    this.data = structuredClone(initial);
  }

  get(key: string): JsonValue | undefined {
    let current: JsonValue | undefined = this.data;
    for (const segment of key.split('.')) {
      if (!isJsonObject(current)) {
        return undefined;
      }
      current = current[segment];
    }
    return current;
  }

  set(key: string, value: JsonValue): void {
    const segments = key.split('.');
    const last = segments.pop();
    if (!last) {
      throw new Error(`Invalid config key: '${key}'`);
    }

    let node = this.data;
    for (const segment of segments) {
      const child = node[segment];
      if (isJsonObject(child)) {
        node = child;
      } else {
        const created: JsonObject = {};
        node[segment] = created;
        node = created;
      }
    }
    node[last] = value;
  }

  unset(key: string): void {
    const segments = key.split('.');
    const last = segments.pop();
    if (!last) {
      return;
    }

    let node: JsonValue | undefined = this.data;
    for (const segment of segments) {
      if (!isJsonObject(node)) {
        return;
      }
      node = node[segment];
    }
    if (isJsonObject(node)) {
      delete node[last];
    }
  }

  async save(): Promise<void> {
    // nothing to persist
  }

  toJSON(): JsonObject {
    return structuredClone(this.data);
  }
}

/**
 * Config store persisted as `config.json` inside the environment directory.
 */
export class FileConfigStore extends MemoryConfigStore {
  private constructor(private readonly path: string, initial: JsonObject) {
    super(initial);
  }

  static async load(path: string): Promise<FileConfigStore> {
    if (!existsSync(path)) {
      return new FileConfigStore(path, {});
    }

    const content = await readFile(path, 'utf-8');
    const parsed: JsonValue = content.trim() ? JSON.parse(content) : {};
    if (!isJsonObject(parsed)) {
      throw new Error(`Config file ${path} must contain a JSON object`);
    }
    return new FileConfigStore(path, parsed);
  }

  override async save(): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, JSON.stringify(this.data, null, 2) + '\n', 'utf-8');
  }
}
