import {
  parseFloatWithDefault,
  parseNumberWithDefault,
  parseOptionalString,
} from '../config.parsers';
import { ConfigError } from '../../shared/errors';

describe('parseOptionalString', () => {
  it('should return the value when it has content', () => {
    expect(parseOptionalString(' sender@example.com ')).toBe(' sender@example.com ');
  });

  it('should treat blank values as absent', () => {
    expect(parseOptionalString(undefined)).toBeUndefined();
    expect(parseOptionalString('')).toBeUndefined();
    expect(parseOptionalString('   ')).toBeUndefined();
  });
});

describe('parseNumberWithDefault', () => {
  it('should return the default when unset', () => {
    expect(parseNumberWithDefault(undefined, 3)).toBe(3);
    expect(parseNumberWithDefault('', 3)).toBe(3);
  });

  it('should parse non-negative integers', () => {
    expect(parseNumberWithDefault('0', 3)).toBe(0);
    expect(parseNumberWithDefault('30000', 3)).toBe(30000);
  });

  it('should reject negative values', () => {
    expect(() => parseNumberWithDefault('-1', 3)).toThrow(
      'Invalid numeric value: "-1" (must be a non-negative finite number)',
    );
  });

  it('should reject fractions', () => {
    expect(() => parseNumberWithDefault('1.5', 3)).toThrow('Invalid numeric value: "1.5" (must be an integer)');
  });

  it('should reject non-numeric values with a ConfigError', () => {
    expect(() => parseNumberWithDefault('soon', 3)).toThrow(ConfigError);
  });
});

describe('parseFloatWithDefault', () => {
  it('should return the default when unset', () => {
    expect(parseFloatWithDefault(undefined, 2)).toBe(2);
  });

  it('should parse decimals, including values below one', () => {
    expect(parseFloatWithDefault('1.5', 2)).toBe(1.5);
    expect(parseFloatWithDefault('0.5', 2)).toBe(0.5);
  });

  it('should reject non-finite values', () => {
    expect(() => parseFloatWithDefault('Infinity', 2)).toThrow(ConfigError);
    expect(() => parseFloatWithDefault('double', 2)).toThrow('Invalid numeric value: "double" (must be a finite number)');
  });
});
