// Project configuration loading
import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { existsSync } from 'fs';
import { join } from 'path';
import { ConfigurationError, describeError } from '../errors/index.js';
import type { ConfigValidationResult, ProjectConfig } from './types.js';
import { validateAndNormalizeConfig, validateConfig } from './validator.js';

export const PROJECT_CONFIG_FILES = ['provision.yaml', 'provision.yml', 'provision.json'];

export type VariableLookup = (name: string) => string | undefined;

/** What happens to a reference that is unset and has no default */
export type UnresolvedVariables = 'keep' | 'empty';

const processEnvLookup: VariableLookup = name => process.env[name];

/**
 * Configuration loader for YAML and JSON project files with environment variable substitution
 */
export class ProjectConfigLoader {
  constructor(private readonly lookup: VariableLookup = processEnvLookup) {}

  /**
   * Load and parse configuration from a file
   * @param path - Path to the configuration file (YAML or JSON)
   * @returns Promise resolving to validated and normalized ProjectConfig
   */
  async load(path: string): Promise<ProjectConfig> {
    try {
      if (!existsSync(path)) {
        throw new Error(`Configuration file not found: ${path}`);
      }

      const content = await readFile(path, 'utf-8');

      let rawConfig: unknown;
      if (path.endsWith('.json')) {
        rawConfig = JSON.parse(content);
      } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
        rawConfig = parseYaml(content);
      } else {
        throw new Error(`Unsupported file format. Only .json, .yml, and .yaml files are supported.`);
      }

      return validateAndNormalizeConfig(resolveVariables(rawConfig, this.lookup));
    } catch (error) {
      throw new ConfigurationError(`Failed to load configuration from ${path}: ${describeError(error)}`, {
        cause: error
      });
    }
  }

  validate(config: unknown): ConfigValidationResult {
    return validateConfig(config);
  }

  /**
   * Load the first project file found in a directory
   * @param projectRoot - Directory searched for provision.yaml, provision.yml, provision.json
   */
  async loadFromDirectory(projectRoot: string): Promise<ProjectConfig> {
    for (const fileName of PROJECT_CONFIG_FILES) {
      const path = join(projectRoot, fileName);
      if (existsSync(path)) {
        return this.load(path);
      }
    }

    throw new ConfigurationError(
      `No project configuration found in ${projectRoot} (looked for ${PROJECT_CONFIG_FILES.join(', ')})`
    );
  }
}

/**
 * Recursively resolve variables in a parsed document.
 * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax
 */
export function resolveVariables(
  value: unknown,
  lookup: VariableLookup,
  unresolved: UnresolvedVariables = 'keep'
): unknown {
  if (typeof value === 'string') {
    return substituteVariables(value, lookup, unresolved);
  }

  if (Array.isArray(value)) {
    return value.map(item => resolveVariables(item, lookup, unresolved));
  }

  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = resolveVariables(entry, lookup, unresolved);
    }
    return result;
  }

  return value;
}

/**
 * Substitute variables in a string
 * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax
 */
export function substituteVariables(
  str: string,
  lookup: VariableLookup,
  unresolved: UnresolvedVariables = 'keep'
): string {
  return str.replace(/\$\{([^}]+)\}/g, (match, varExpression: string) => {
    const separator = varExpression.indexOf(':-');
    const varName = separator === -1 ? varExpression : varExpression.slice(0, separator);
    const defaultValue = separator === -1 ? undefined : varExpression.slice(separator + 2);
    const value = lookup(varName.trim());

    if (value !== undefined) {
      return value;
    }

    if (defaultValue !== undefined) {
      return defaultValue;
    }

    return unresolved === 'keep' ? match : '';
  });
}

export function createConfigLoader(lookup?: VariableLookup): ProjectConfigLoader {
  return new ProjectConfigLoader(lookup);
}
