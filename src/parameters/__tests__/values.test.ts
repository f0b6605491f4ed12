import { describe, it, expect } from 'vitest';
import type { ParameterValue } from '../../types/index.js';
import {
  convertFileValue,
  formatValue,
  parseBoolean,
  parseInteger,
  toDeploymentParameters,
  toParameterValue
} from '../values.js';

describe('parameter values', () => {
  describe('toParameterValue', () => {
    it('should wrap values of the declared type', () => {
      expect(toParameterValue('string', 'eastus')).toEqual({ kind: 'string', value: 'eastus' });
      expect(toParameterValue('boolean', false)).toEqual({ kind: 'boolean', value: false });
      expect(toParameterValue('number', 3)).toEqual({ kind: 'number', value: 3 });
      expect(toParameterValue('array', ['a'])).toEqual({ kind: 'array', value: ['a'] });
      expect(toParameterValue('object', { a: 1 })).toEqual({ kind: 'object', value: { a: 1 } });
    });

    it('should reject values of another shape', () => {
      expect(toParameterValue('number', 1.5)).toBeUndefined();
      expect(toParameterValue('number', '3')).toBeUndefined();
      expect(toParameterValue('object', ['a'])).toBeUndefined();
      expect(toParameterValue('array', { a: 1 })).toBeUndefined();
      expect(toParameterValue('string', null)).toBeUndefined();
    });
  });

  describe('convertFileValue', () => {
    it('should accept convertible strings for booleans and numbers', () => {
      expect(convertFileValue('boolean', 'True')).toEqual({ kind: 'boolean', value: true });
      expect(convertFileValue('number', ' 42 ')).toEqual({ kind: 'number', value: 42 });
    });

    it('should reject strings that do not convert', () => {
      expect(convertFileValue('number', '4.2')).toBeUndefined();
      expect(convertFileValue('boolean', 'yes')).toBeUndefined();
      expect(convertFileValue('string', 5)).toBeUndefined();
    });
  });

  it('should parse booleans and integers', () => {
    expect(parseBoolean('0')).toBe(false);
    expect(parseBoolean('1')).toBe(true);
    expect(parseInteger('-7')).toBe(-7);
    expect(parseInteger('9007199254740993')).toBeUndefined();
  });

  it('should format values for display', () => {
    expect(formatValue('plain')).toBe('plain');
    expect(formatValue(['a', 1])).toBe('["a",1]');
  });

  it('should build deployment parameters from resolved values', () => {
    const parameters = toDeploymentParameters(
      new Map<string, ParameterValue>([
        ['location', { kind: 'string', value: 'eastus' }],
        ['size', { kind: 'number', value: 5 }]
      ])
    );

    expect(parameters).toEqual({ location: 'eastus', size: 5 });
  });
});
