import addressparser from 'nodemailer/lib/addressparser';
import { parseOptionalString } from '../config/config.parsers';
import { ConfigError, ParseError } from '../shared/errors';
import type { Mailbox } from './interfaces';

const ADDR_SPEC_PATTERN = /^[^\s@<>()",;]+@[^\s@<>()",;]+$/;

/**
 * Parses a single mailbox such as `Ada <ada@example.com>` or
 * `ada@example.com`. Groups and address lists are rejected.
 *
 * @throws {ParseError} When the value is not exactly one valid mailbox
 */
export function parseMailbox(value: string): Mailbox {
  const parsed = addressparser(value);

  if (parsed.length !== 1) {
    throw new ParseError(`invalid email address: ${value}`);
  }

  const [entry] = parsed;
  if (!('address' in entry) || !ADDR_SPEC_PATTERN.test(entry.address)) {
    throw new ParseError(`invalid email address: ${value}`);
  }

  return { name: entry.name, address: entry.address };
}

export function parseMailboxes(values: readonly string[]): Mailbox[] {
  return values.map(parseMailbox);
}

/**
 * Formats a mailbox for a header field, quoting the display name.
 */
export function formatMailbox(mailbox: Mailbox): string {
  if (!mailbox.name) {
    return mailbox.address;
  }
  const quoted = mailbox.name.replace(/(["\\])/g, '\\$1');
  return `"${quoted}" <${mailbox.address}>`;
}

/**
 * Sender resolution: a non-blank `--from`, then a non-blank MAIL_FROM.
 *
 * @throws {ConfigError} When neither is set
 */
export function resolveSender(from: string | undefined, envFrom: string | undefined): string {
  const sender = parseOptionalString(from) ?? parseOptionalString(envFrom);
  if (sender === undefined) {
    throw new ConfigError('provide --from or set MAIL_FROM');
  }
  return sender;
}
