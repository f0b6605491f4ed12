import { parse as parseDotenv } from 'dotenv';
import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { ConfigurationError } from '../errors/index.js';
import { FileConfigStore } from './config-store.js';
import { type ConfigStore, EnvironmentKeys, type EnvironmentStore } from './types.js';

export class MemoryEnvironmentStore implements EnvironmentStore {
  protected readonly entries: Map<string, string>;

  constructor(readonly name: string, initial: Record<string, string> = {}) {
    this.entries = new Map(Object.entries(initial));
    if (!this.entries.has(EnvironmentKeys.EnvironmentName)) {
      this.entries.set(EnvironmentKeys.EnvironmentName, name);
    }
  }

  get(key: string): string | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: string): void {
    this.entries.set(key, value);
  }

  unset(key: string): void {
    this.entries.delete(key);
  }

  values(): Record<string, string> {
    return Object.fromEntries(this.entries);
  }

  async save(): Promise<void> {
    // nothing to persist
  }
}

/**
 * Environment values stored in `.provision/<env>/.env`.
 */
export class DotenvEnvironmentStore extends MemoryEnvironmentStore {
  private constructor(name: string, private readonly path: string, initial: Record<string, string>) {
    super(name, initial);
  }

  static async load(name: string, path: string): Promise<DotenvEnvironmentStore> {
    const initial = existsSync(path) ? parseDotenv(await readFile(path, 'utf-8')) : {};
    return new DotenvEnvironmentStore(name, path, initial);
  }

  override async save(): Promise<void> {
    const lines = [...this.entries.keys()]
      .sort()
      .map(key => `${key}=${formatDotenvValue(this.entries.get(key) ?? '')}`);
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, lines.join('\n') + '\n', 'utf-8');
  }
}

/**
 * Quote values dotenv would otherwise misread: whitespace, `#`, quotes and line breaks.
 */
export function formatDotenvValue(value: string): string {
  if (value === '' || /^[A-Za-z0-9_./:@,+-]+$/.test(value)) {
    return value;
  }
  const escaped = value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
  return `"${escaped}"`;
}

export interface EnvironmentPaths {
  directory: string;
  dotenvPath: string;
  configPath: string;
}

export function environmentPaths(projectRoot: string, environmentName: string): EnvironmentPaths {
  const directory = join(projectRoot, '.provision', environmentName);
  return {
    directory,
    dotenvPath: join(directory, '.env'),
    configPath: join(directory, 'config.json')
  };
}

export interface LoadedEnvironment {
  environment: EnvironmentStore;
  config: ConfigStore;
}

export async function loadEnvironment(projectRoot: string, environmentName: string): Promise<LoadedEnvironment> {
  if (!/^[A-Za-z0-9-_.]{1,64}$/.test(environmentName)) {
    throw new ConfigurationError(
      `Invalid environment name '${environmentName}': use up to 64 letters, digits, '-', '_' or '.'`
    );
  }

  const paths = environmentPaths(projectRoot, environmentName);
  const [environment, config] = await Promise.all([
    DotenvEnvironmentStore.load(environmentName, paths.dotenvPath),
    FileConfigStore.load(paths.configPath)
  ]);
  return { environment, config };
}
