import { ConfigError } from '../shared/errors';

/**
 * Returns the value when it contains anything other than whitespace,
 * otherwise `undefined`. Blank flags and environment variables are treated
 * as absent.
 */
export function parseOptionalString(value: string | undefined): string | undefined {
  if (value === undefined || !value.trim()) {
    return undefined;
  }
  return value;
}

export function parseNumberWithDefault(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigError(`Invalid numeric value: "${value}" (must be a non-negative finite number)`);
  }

  // Attempt counts, delays and timeouts are whole numbers
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`Invalid numeric value: "${value}" (must be an integer)`);
  }

  return parsed;
}

/**
 * Parses a finite decimal value such as a backoff multiplier.
 */
export function parseFloatWithDefault(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`Invalid numeric value: "${value}" (must be a finite number)`);
  }

  return parsed;
}
