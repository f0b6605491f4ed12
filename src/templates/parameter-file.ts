import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import Joi from 'joi';
import { ConfigurationError } from '../errors/index.js';
import { substituteVariables, type VariableLookup } from '../config/loader.js';
import type { JsonValue } from '../types/index.js';
import type { Logger } from '../logger.js';
import type { ArmParameterFile } from './types.js';

const parameterFileSchema = Joi.object({
  $schema: Joi.string(),
  contentVersion: Joi.string(),
  parameters: Joi.object()
    .pattern(Joi.string(), Joi.object({ value: Joi.any(), reference: Joi.object() }).unknown(true))
    .default({})
}).unknown(true);

/** Values a parameter file supplies, keyed by parameter name */
export type ParameterFileValues = Map<string, JsonValue>;

/**
 * Reads `<module>.parameters.json`, substituting `${VAR}` references before parsing.
 * Unset references become empty strings.
 */
export class ParameterFileLoader {
  constructor(private readonly logger?: Logger) {}

  async load(path: string, lookup: VariableLookup): Promise<ParameterFileValues> {
    if (!existsSync(path)) {
      this.logger?.debug(`No parameters file at ${path}`);
      return new Map();
    }

    this.logger?.debug(`Reading parameters file from ${path}`);
    const content = await readFile(path, 'utf-8');
    return this.parse(path, substituteVariables(content, lookup, 'empty'));
  }

  parse(path: string, content: string): ParameterFileValues {
    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Parameters file ${path} is not valid JSON after substitution`, { cause: error });
    }

    const { error, value } = parameterFileSchema.validate(document);
    if (error) {
      throw new ConfigurationError(`Invalid parameters file ${path}: ${error.message}`, { cause: error });
    }
    const file: ArmParameterFile = value;

    const values: ParameterFileValues = new Map();
    for (const [name, entry] of Object.entries(file.parameters)) {
      if (entry.value !== undefined) {
        values.set(name, entry.value);
      } else if (entry.reference !== undefined) {
        this.logger?.debug(`Parameter '${name}' uses a secret reference and is left to the deployment`);
      }
    }
    return values;
  }
}
