import type { Console, PromptOptions } from '../console/types.js';
import { ConfigurationError } from '../errors/index.js';
import type { Logger } from '../logger.js';
import type { JsonValue, ParameterDefinition, ParameterValue } from '../types/index.js';
import { substituteReferences, substituteText } from './dependency-graph.js';
import { generateValue } from './password.js';
import { locationsWithQuota } from './quota.js';
import type { PromptContext, PromptServices } from './types.js';
import {
  firstFailure,
  type InputValidator,
  validateJsonArray,
  validateJsonObject,
  validateLengthRange,
  validateValueRange
} from './validators.js';
import { formatValue, parseInteger, toParameterValue } from './values.js';

const AUTO_GENERATE = 'Auto generate';
const MANUAL_INPUT = 'Manual input';

/**
 * Asks for the value of one template parameter. The kind of question depends on the
 * parameter's type, its allowed values and its `metadata.provision` hints.
 */
export class ParameterPrompter {
  constructor(
    private readonly console: Console,
    private readonly services: PromptServices,
    private readonly logger?: Logger
  ) {}

  /**
   * @param resolved - values already known, used to fill `${name}` references in the metadata
   */
  async promptForParameter(
    name: string,
    definition: ParameterDefinition,
    context: PromptContext,
    resolved: ReadonlyMap<string, JsonValue> = new Map()
  ): Promise<ParameterValue> {
    const metadata = definition.metadata;
    const metadataDefault =
      metadata?.default === undefined ? undefined : substituteReferences(metadata.default, resolved);

    switch (metadata?.type) {
      case 'location':
        if (definition.type === 'string') {
          const usageNames = (metadata?.usageName ?? []).map(usage => substituteText(usage, resolved));
          return this.promptLocation(name, definition, context, usageNames, metadataDefault);
        }
        break;
      case 'resourceGroup':
        if (definition.type === 'string') {
          return this.promptResourceGroup(name, context);
        }
        break;
      case 'generate':
        return this.generate(name, definition);
      case 'generateOrManual':
        return this.promptGenerateOrManual(name, definition);
    }

    if (definition.allowedValues !== undefined) {
      return this.promptAllowedValue(name, definition, definition.allowedValues, metadataDefault);
    }

    return this.promptFreeText(name, definition, metadataDefault);
  }

  private async promptLocation(
    name: string,
    definition: ParameterDefinition,
    context: PromptContext,
    usageNames: string[],
    metadataDefault: JsonValue | undefined
  ): Promise<ParameterValue> {
    if (context.session.location) {
      this.logger?.debug(`Using session location ${context.session.location} for '${name}'`);
      return { kind: 'string', value: context.session.location };
    }

    const subscriptionId = requireSubscription(name, context);
    let locations = await this.services.listLocations(subscriptionId);

    if (definition.allowedValues !== undefined) {
      const allowed = new Set(
        definition.allowedValues.filter(isString).map(location => location.toLowerCase())
      );
      locations = locations.filter(location => allowed.has(location.name.toLowerCase()));
    }

    if (usageNames.length > 0) {
      const withQuota = new Set(
        await locationsWithQuota(
          this.services,
          subscriptionId,
          locations.map(location => location.name),
          usageNames,
          this.logger
        )
      );
      locations = locations.filter(location => withQuota.has(location.name));
    }

    if (locations.length === 0) {
      throw new ConfigurationError(`No location is available for the '${name}' infrastructure parameter`, {
        remediation: 'Check the allowed values of the parameter and the locations enabled for the subscription'
      });
    }

    const options = locations.map(location => `${location.displayName} (${location.name})`);
    const preferred = locations.find(
      location => typeof metadataDefault === 'string' && location.name.toLowerCase() === metadataDefault.toLowerCase()
    );

    const index = await this.console.select({
      message: `Select a location to use for the '${name}' infrastructure parameter:`,
      help: definition.description,
      options,
      defaultValue: preferred ? `${preferred.displayName} (${preferred.name})` : options[0]
    });

    const chosen = locations[index].name;
    context.session.location = chosen;
    return { kind: 'string', value: chosen };
  }

  private async promptResourceGroup(name: string, context: PromptContext): Promise<ParameterValue> {
    const subscriptionId = requireSubscription(name, context);
    const groups = [...(await this.services.listResourceGroups(subscriptionId))].sort((a, b) => a.localeCompare(b));
    if (groups.length === 0) {
      throw new ConfigurationError(`The subscription has no resource groups to offer for '${name}'`, {
        remediation: 'Create a resource group first or set the parameter in the parameters file'
      });
    }

    const index = await this.console.select({
      message: `Select a resource group to use for the '${name}' infrastructure parameter:`,
      options: groups
    });
    return { kind: 'string', value: groups[index] };
  }

  private generate(name: string, definition: ParameterDefinition): ParameterValue {
    if (definition.type !== 'string') {
      throw new ConfigurationError(`Parameter '${name}' asks for a generated value but is of type ${definition.type}`);
    }
    return { kind: 'string', value: generateValue(definition.metadata?.config) };
  }

  private async promptGenerateOrManual(name: string, definition: ParameterDefinition): Promise<ParameterValue> {
    const generated = this.generate(name, definition);
    const kind = definition.secure ? 'secured parameter' : 'parameter';

    const index = await this.console.select({
      message: `For the '${name}' infrastructure ${kind}, generate a value or enter one?`,
      help: definition.description,
      options: [AUTO_GENERATE, MANUAL_INPUT],
      defaultValue: AUTO_GENERATE
    });
    if (index === 0) {
      return generated;
    }

    const input = await this.promptUntilValid(
      { message: promptMessage(name, definition), help: definition.description, secret: definition.secure },
      [validateLengthRange(name, definition.minLength, definition.maxLength)]
    );
    return { kind: 'string', value: input };
  }

  private async promptAllowedValue(
    name: string,
    definition: ParameterDefinition,
    allowedValues: JsonValue[],
    metadataDefault: JsonValue | undefined
  ): Promise<ParameterValue> {
    if (allowedValues.length === 0) {
      throw new ConfigurationError(`Parameter '${name}' declares an empty list of allowed values`);
    }

    const options = allowedValues.map(formatValue);
    let defaultValue = options[0];
    if (metadataDefault !== undefined) {
      const formatted = formatValue(metadataDefault);
      if (!options.includes(formatted)) {
        throw new ConfigurationError(
          `The default value '${formatted}' of parameter '${name}' is not one of its allowed values: ${options.join(', ')}`
        );
      }
      defaultValue = formatted;
    }

    const index = await this.console.select({
      message: promptMessage(name, definition),
      help: definition.description,
      options,
      defaultValue
    });

    const value = toParameterValue(definition.type, allowedValues[index]);
    if (value === undefined) {
      throw new ConfigurationError(
        `The allowed value '${options[index]}' of parameter '${name}' is not a ${definition.type}`
      );
    }
    return value;
  }

  private async promptFreeText(
    name: string,
    definition: ParameterDefinition,
    metadataDefault: JsonValue | undefined
  ): Promise<ParameterValue> {
    const base: PromptOptions = {
      message: promptMessage(name, definition),
      help: definition.description,
      secret: definition.secure
    };

    switch (definition.type) {
      case 'boolean': {
        const options = ['False', 'True'];
        const index = await this.console.select({
          message: base.message,
          help: base.help,
          options,
          defaultValue: typeof metadataDefault === 'boolean' ? options[Number(metadataDefault)] : undefined
        });
        return { kind: 'boolean', value: index === 1 };
      }
      case 'number': {
        const input = await this.promptUntilValid(
          { ...base, defaultValue: typeof metadataDefault === 'number' ? String(metadataDefault) : undefined },
          [validateValueRange(name, definition.minValue, definition.maxValue)]
        );
        const value = parseInteger(input);
        if (value === undefined) {
          throw new ConfigurationError(`The value for '${name}' must be an integer`);
        }
        return { kind: 'number', value };
      }
      case 'string': {
        const input = await this.promptUntilValid(
          { ...base, defaultValue: typeof metadataDefault === 'string' ? metadataDefault : undefined },
          [validateLengthRange(name, definition.minLength, definition.maxLength)]
        );
        return { kind: 'string', value: input };
      }
      case 'array':
      case 'object': {
        const validator = definition.type === 'array' ? validateJsonArray : validateJsonObject;
        const input = await this.promptUntilValid(
          { ...base, defaultValue: metadataDefault === undefined ? undefined : JSON.stringify(metadataDefault) },
          [validator]
        );
        const parsed: JsonValue = JSON.parse(input);
        const value = toParameterValue(definition.type, parsed);
        if (value === undefined) {
          throw new ConfigurationError(`The value for '${name}' must be a JSON ${definition.type}`);
        }
        return value;
      }
    }
  }

  /** Asks again, showing the failed check, until every validator accepts the input */
  private async promptUntilValid(options: PromptOptions, validators: InputValidator[]): Promise<string> {
    for (;;) {
      const input = await this.console.prompt(options);
      const failure = firstFailure(input, validators);
      if (failure === undefined) {
        return input;
      }
      this.console.message(`Error: ${failure}.`);
    }
  }
}

function promptMessage(name: string, definition: ParameterDefinition): string {
  const kind = definition.secure ? 'secured parameter' : 'parameter';
  return `Enter a value for the '${name}' infrastructure ${kind}:`;
}

function requireSubscription(name: string, context: PromptContext): string {
  if (!context.subscriptionId) {
    throw new ConfigurationError(`A subscription is required to prompt for '${name}'`, {
      remediation: 'Set azure.subscription_id in provision.yaml or AZURE_SUBSCRIPTION_ID in the environment'
    });
  }
  return context.subscriptionId;
}

function isString(value: JsonValue): value is string {
  return typeof value === 'string';
}

export function createParameterPrompter(console: Console, services: PromptServices, logger?: Logger): ParameterPrompter {
  return new ParameterPrompter(console, services, logger);
}
