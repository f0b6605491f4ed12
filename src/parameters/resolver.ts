import { type ConfigStore, PARAMETER_CONFIG_PREFIX } from '../config/types.js';
import { ConfigurationError, describeError } from '../errors/index.js';
import type { Logger } from '../logger.js';
import type { JsonValue, ParameterDefinition, ParameterValue, ResolvedParameters } from '../types/index.js';
import { orderByDependencies } from './dependency-graph.js';
import type { ParameterPrompter } from './prompt.js';
import type { ResolveRequest } from './types.js';
import { convertFileValue, formatValue, toParameterValue } from './values.js';

export function parameterConfigKey(name: string): string {
  return `${PARAMETER_CONFIG_PREFIX}.${name}`;
}

/**
 * Turns template parameter definitions into a Resolved Parameter Set.
 *
 * Each parameter is taken from the parameters file, then from saved config, and only
 * then asked for. Parameters with a default are left out of the set unless the file or
 * config overrides them; the template applies the default. Prompted values are saved
 * back to config in one write at the end.
 */
export class ParameterResolver {
  private readonly cache = new Map<string, ResolvedParameters>();

  constructor(
    private readonly prompter: ParameterPrompter,
    private readonly config: ConfigStore,
    private readonly logger: Logger
  ) {}

  async resolve(request: ResolveRequest): Promise<ResolvedParameters> {
    const cached = this.cache.get(request.modulePath);
    if (cached) {
      this.logger.debug(`Reusing resolved parameters for ${request.modulePath}`);
      return new Map(cached);
    }

    const resolved: ResolvedParameters = new Map();
    const queue: string[] = [];
    let configChanged = false;

    for (const [name, definition] of request.parameters) {
      const fromFile = this.fromParameterFile(name, definition, request.parameterFile);
      if (fromFile) {
        resolved.set(name, fromFile);
        continue;
      }

      const saved = this.config.get(parameterConfigKey(name));
      if (saved !== undefined) {
        const fromConfig = toParameterValue(definition.type, saved);
        if (fromConfig) {
          resolved.set(name, fromConfig);
          continue;
        }
        this.logger.warn(
          `Ignoring saved value '${formatValue(saved)}' for parameter '${name}': it is not a ${definition.type}`
        );
        this.config.unset(parameterConfigKey(name));
        configChanged = true;
      }

      if (definition.defaultValue === undefined) {
        queue.push(name);
      }
    }

    // Cycles and unknown references fail here, before anything is asked
    const ordered = orderByDependencies(queue, request.parameters);

    const known = new Map<string, JsonValue>();
    for (const [name, definition] of request.parameters) {
      const value = resolved.get(name)?.value ?? definition.defaultValue;
      if (value !== undefined) {
        known.set(name, value);
      }
    }

    for (const name of ordered) {
      const definition = this.definitionOf(request.parameters, name);
      const value = await this.prompter.promptForParameter(
        name,
        definition,
        { session: request.session, subscriptionId: request.subscriptionId },
        known
      );
      resolved.set(name, value);
      known.set(name, value.value);
      this.config.set(parameterConfigKey(name), value.value);
      configChanged = true;
    }

    if (configChanged) {
      try {
        await this.config.save();
      } catch (error) {
        this.logger.warn(`Failed to save infrastructure parameters to config: ${describeError(error)}`);
      }
    }

    for (const [name, definition] of request.parameters) {
      if (definition.defaultValue === undefined && !resolved.has(name)) {
        throw new ConfigurationError(`No value was resolved for required parameter '${name}'`);
      }
    }

    this.cache.set(request.modulePath, resolved);
    return new Map(resolved);
  }

  private fromParameterFile(
    name: string,
    definition: ParameterDefinition,
    parameterFile: ReadonlyMap<string, JsonValue>
  ): ParameterValue | undefined {
    const raw = parameterFile.get(name);
    if (raw === undefined) {
      return undefined;
    }
    // An empty value, e.g. from an unset variable, only counts when nothing else can stand in
    if (raw === '' && definition.defaultValue !== undefined) {
      return undefined;
    }

    const value = convertFileValue(definition.type, raw);
    if (!value) {
      this.logger.debug(
        `Parameters file value '${formatValue(raw)}' for '${name}' cannot be used as a ${definition.type}`
      );
    }
    return value;
  }

  private definitionOf(parameters: ReadonlyMap<string, ParameterDefinition>, name: string): ParameterDefinition {
    const definition = parameters.get(name);
    if (!definition) {
      throw new ConfigurationError(`Parameter '${name}' is not declared by the template`);
    }
    return definition;
  }
}

export function createParameterResolver(
  prompter: ParameterPrompter,
  config: ConfigStore,
  logger: Logger
): ParameterResolver {
  return new ParameterResolver(prompter, config, logger);
}
