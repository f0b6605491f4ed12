import { parseInteger } from './values.js';

/** Returns an error message, or undefined when the input is acceptable */
export type InputValidator = (input: string) => string | undefined;

export function validateLengthRange(name: string, minLength?: number, maxLength?: number): InputValidator {
  return input => {
    if (minLength !== undefined && input.length < minLength) {
      return `the value for '${name}' must be at least ${minLength} characters long`;
    }
    if (maxLength !== undefined && input.length > maxLength) {
      return `the value for '${name}' must be at most ${maxLength} characters long`;
    }
    return undefined;
  };
}

export function validateValueRange(name: string, minValue?: number, maxValue?: number): InputValidator {
  return input => {
    const value = parseInteger(input);
    if (value === undefined) {
      return `the value for '${name}' must be an integer`;
    }
    if (minValue !== undefined && value < minValue) {
      return `the value for '${name}' must be at least ${minValue}`;
    }
    if (maxValue !== undefined && value > maxValue) {
      return `the value for '${name}' must be at most ${maxValue}`;
    }
    return undefined;
  };
}

export const validateJsonArray: InputValidator = input => {
  try {
    const parsed: unknown = JSON.parse(input);
    return Array.isArray(parsed) ? undefined : 'the value must be a JSON array, e.g. ["a", "b"]';
  } catch (error) {
    return `the value must be a JSON array: ${error instanceof Error ? error.message : String(error)}`;
  }
};

export const validateJsonObject: InputValidator = input => {
  try {
    const parsed: unknown = JSON.parse(input);
    const isObject = typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed);
    return isObject ? undefined : 'the value must be a JSON object, e.g. {"key": "value"}';
  } catch (error) {
    return `the value must be a JSON object: ${error instanceof Error ? error.message : String(error)}`;
  }
};

export function firstFailure(input: string, validators: readonly InputValidator[]): string | undefined {
  for (const validator of validators) {
    const failure = validator(input);
    if (failure !== undefined) {
      return failure;
    }
  }
  return undefined;
}
