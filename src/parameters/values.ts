import type { JsonObject, JsonValue, ParameterType, ParameterValue } from '../types/index.js';

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Wraps a JSON value in the variant for `type`, or returns undefined when the value
 * does not have that shape. Numbers must be integral.
 */
export function toParameterValue(type: ParameterType, value: JsonValue): ParameterValue | undefined {
  switch (type) {
    case 'string':
      return typeof value === 'string' ? { kind: 'string', value } : undefined;
    case 'boolean':
      return typeof value === 'boolean' ? { kind: 'boolean', value } : undefined;
    case 'number':
      return typeof value === 'number' && Number.isInteger(value) ? { kind: 'number', value } : undefined;
    case 'array':
      return Array.isArray(value) ? { kind: 'array', value } : undefined;
    case 'object':
      return isJsonObject(value) ? { kind: 'object', value } : undefined;
  }
}

export function fromParameterValue(parameter: ParameterValue): JsonValue {
  return parameter.value;
}

/**
 * Parameter files are hand-written, so booleans and numbers also accept convertible strings.
 */
export function convertFileValue(type: ParameterType, value: JsonValue): ParameterValue | undefined {
  if (typeof value === 'string') {
    if (type === 'boolean') {
      const parsed = parseBoolean(value);
      return parsed === undefined ? undefined : { kind: 'boolean', value: parsed };
    }
    if (type === 'number') {
      const parsed = parseInteger(value);
      return parsed === undefined ? undefined : { kind: 'number', value: parsed };
    }
  }
  return toParameterValue(type, value);
}

export function parseBoolean(value: string): boolean | undefined {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      return undefined;
  }
}

export function parseInteger(value: string): number | undefined {
  const trimmed = value.trim();
  if (!/^[-+]?\d+$/.test(trimmed)) {
    return undefined;
  }
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

/** Text shown for a value in prompts and option lists */
export function formatValue(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/** Converts a map of resolved parameters into the `{ name: value }` object a deployment takes */
export function toDeploymentParameters(parameters: Map<string, ParameterValue>): Record<string, JsonValue> {
  const result: Record<string, JsonValue> = {};
  for (const [name, parameter] of parameters) {
    result[name] = fromParameterValue(parameter);
  }
  return result;
}
