import { ParseError } from '../shared/errors';
import type { HeaderField } from './interfaces';

// Printable US-ASCII except ":" (RFC 5322 field-name)
const HEADER_NAME_PATTERN = /^[\x21-\x39\x3b-\x7e]+$/;

/**
 * Parses raw `Name: Value` lines into header fields, in input order.
 *
 * Each line splits on the first colon; name and value are trimmed. Duplicate
 * names are kept as given.
 *
 * @throws {ParseError} On a missing colon, an invalid name, or a value
 * containing a line break
 */
export function parseHeaderLines(lines: readonly string[]): HeaderField[] {
  return lines.map(parseHeaderLine);
}

export function parseHeaderLine(raw: string): HeaderField {
  const separator = raw.indexOf(':');
  if (separator === -1) {
    throw new ParseError(`invalid header format "${raw}": expected Name: Value`);
  }

  const name = raw.slice(0, separator).trim();
  const value = raw.slice(separator + 1).trim();

  if (!isValidHeaderName(name)) {
    throw new ParseError(`invalid header name: "${name}"`);
  }
  if (/[\r\n]/.test(value)) {
    throw new ParseError(`header "${name}" must not contain line breaks`);
  }

  return { name, value };
}

export function isValidHeaderName(name: string): boolean {
  return HEADER_NAME_PATTERN.test(name);
}
