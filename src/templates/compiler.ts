import Joi from 'joi';
import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { extname } from 'path';
import { CompileError, ConfigurationError } from '../errors/index.js';
import type {
  CompiledTemplate,
  JsonObject,
  JsonValue,
  OutputDefinition,
  ParameterDefinition,
  ParameterMetadata,
  ParameterType,
  TargetScope
} from '../types/index.js';
import type { Logger } from '../logger.js';
import type { ArmParameterDefinition, ArmTemplate, TemplateCompiler } from './types.js';

const generationPolicySchema = Joi.object({
  length: Joi.number().integer().min(1).max(128),
  noLower: Joi.boolean(),
  noUpper: Joi.boolean(),
  noNumeric: Joi.boolean(),
  noSpecial: Joi.boolean(),
  minLower: Joi.number().integer().min(0),
  minUpper: Joi.number().integer().min(0),
  minNumeric: Joi.number().integer().min(0),
  minSpecial: Joi.number().integer().min(0)
});

const provisionMetadataSchema = Joi.object({
  type: Joi.string().valid('location', 'generate', 'generateOrManual', 'resourceGroup'),
  default: Joi.any(),
  usageName: Joi.array().items(Joi.string()).single(),
  config: generationPolicySchema
}).unknown(true);

const parameterSchema = Joi.object({
  type: Joi.string().required(),
  defaultValue: Joi.any(),
  allowedValues: Joi.array(),
  minValue: Joi.number(),
  maxValue: Joi.number(),
  minLength: Joi.number().integer().min(0),
  maxLength: Joi.number().integer().min(0),
  metadata: Joi.object({
    description: Joi.string(),
    provision: provisionMetadataSchema
  }).unknown(true)
}).unknown(true);

const templateSchema = Joi.object({
  $schema: Joi.string().required(),
  contentVersion: Joi.string().required(),
  parameters: Joi.object().pattern(Joi.string(), parameterSchema),
  resources: Joi.alternatives(Joi.array(), Joi.object()).required(),
  outputs: Joi.object().pattern(Joi.string(), Joi.object({ type: Joi.string().required() }).unknown(true))
}).unknown(true);

const SUBSCRIPTION_SCHEMA_MARKER = 'subscriptiondeploymenttemplate.json';

/**
 * Maps an ARM type name onto the engine's parameter types.
 */
export function parameterTypeFromArmType(armType: string): { type: ParameterType; secure: boolean } {
  switch (armType.toLowerCase()) {
    case 'string':
      return { type: 'string', secure: false };
    case 'securestring':
      return { type: 'string', secure: true };
    case 'bool':
      return { type: 'boolean', secure: false };
    case 'int':
      return { type: 'number', secure: false };
    case 'object':
      return { type: 'object', secure: false };
    case 'secureobject':
      return { type: 'object', secure: true };
    case 'array':
      return { type: 'array', secure: false };
    default:
      throw new ConfigurationError(`Unsupported parameter type '${armType}'`);
  }
}

export function targetScopeFromSchema(schema: string): TargetScope {
  return schema.toLowerCase().includes(SUBSCRIPTION_SCHEMA_MARKER) ? 'subscription' : 'resourceGroup';
}

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toParameterDefinition(name: string, definition: ArmParameterDefinition): ParameterDefinition {
  let mapped: { type: ParameterType; secure: boolean };
  try {
    mapped = parameterTypeFromArmType(definition.type);
  } catch (error) {
    throw new ConfigurationError(`Parameter '${name}' has unsupported type '${definition.type}'`, { cause: error });
  }

  const metadata = definition.metadata;
  const description = metadata?.description;
  const provision = metadata?.provision;

  return {
    type: mapped.type,
    secure: mapped.secure,
    defaultValue: definition.defaultValue,
    allowedValues: definition.allowedValues,
    minValue: definition.minValue,
    maxValue: definition.maxValue,
    minLength: definition.minLength,
    maxLength: definition.maxLength,
    description: typeof description === 'string' ? description : undefined,
    metadata: isJsonObject(provision) ? toParameterMetadata(provision) : undefined
  };
}

function toParameterMetadata(provision: JsonObject): ParameterMetadata {
  // Shape was checked by provisionMetadataSchema; `usageName` may be a single string
  const { value } = provisionMetadataSchema.validate(provision);
  return value;
}

/**
 * Compiler for ARM JSON templates. Results are cached by module path for the
 * lifetime of the instance.
 */
export class ArmTemplateCompiler implements TemplateCompiler {
  private readonly cache = new Map<string, CompiledTemplate>();

  constructor(private readonly logger?: Logger) {}

  async compile(modulePath: string): Promise<CompiledTemplate> {
    const cached = this.cache.get(modulePath);
    if (cached) {
      return cached;
    }

    const extension = extname(modulePath).toLowerCase();
    if (extension !== '.json') {
      throw new CompileError(modulePath, `unsupported template format '${extension || '(none)'}', expected an ARM JSON template`);
    }
    if (!existsSync(modulePath)) {
      throw new CompileError(modulePath, 'module not found');
    }

    const rawArtifact = await readFile(modulePath, 'utf-8');
    const compiled = this.parse(modulePath, rawArtifact);
    this.cache.set(modulePath, compiled);
    this.logger?.debug(
      `Compiled ${modulePath}: ${compiled.parameters.size} parameters, ${compiled.outputs.size} outputs, ${compiled.targetScope} scope`
    );
    return compiled;
  }

  parse(modulePath: string, rawArtifact: string): CompiledTemplate {
    let document: unknown;
    try {
      document = JSON.parse(rawArtifact);
    } catch (error) {
      throw new CompileError(modulePath, 'template is not valid JSON', error);
    }

    const { error, value } = templateSchema.validate(document, { abortEarly: false });
    if (error) {
      throw new CompileError(modulePath, error.details.map(detail => detail.message).join('; '), error);
    }
    const template: ArmTemplate = value;

    const parameters = new Map<string, ParameterDefinition>();
    for (const [name, definition] of Object.entries(template.parameters ?? {})) {
      parameters.set(name, toParameterDefinition(name, definition));
    }

    const outputs = new Map<string, OutputDefinition>();
    for (const [name, definition] of Object.entries(template.outputs ?? {})) {
      outputs.set(name, { type: parameterTypeFromArmType(definition.type).type });
    }

    return {
      modulePath,
      rawArtifact,
      parameters,
      outputs,
      targetScope: targetScopeFromSchema(template.$schema)
    };
  }
}
