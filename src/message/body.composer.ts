import { readFileSync } from 'fs';
import { TextDecoder } from 'util';
import { ConfigError, IOError } from '../shared/errors';
import type { AttachmentPart, BodySources, MessagePart } from './interfaces';

/**
 * One body channel as given on the command line: an inline value, a file
 * path, both, or neither.
 */
export interface BodyChannelInput {
  inline?: string;
  file?: string;
}

/**
 * Loads the text and html body sources.
 *
 * Each channel takes either an inline value or a file, never both. A
 * channel with neither is absent.
 *
 * @throws {ConfigError} When a channel has both an inline value and a file
 * @throws {IOError} When a body file cannot be read or is not valid UTF-8
 */
export function loadBodySources(text: BodyChannelInput, html: BodyChannelInput): BodySources {
  return {
    text: resolveBodyChannel('text', text),
    html: resolveBodyChannel('html', html),
  };
}

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

function resolveBodyChannel(label: 'text' | 'html', channel: BodyChannelInput): string | undefined {
  if (channel.inline !== undefined && channel.file !== undefined) {
    throw new ConfigError(`provide either --${label} or --${label}-file, not both`);
  }
  if (channel.inline !== undefined) {
    return channel.inline;
  }
  if (channel.file !== undefined) {
    try {
      return utf8Decoder.decode(readFileSync(channel.file));
    } catch (error) {
      throw new IOError(`failed to read ${label} body from ${channel.file}`, channel.file, { cause: error });
    }
  }
  return undefined;
}

/**
 * Chooses the body structure from the available renderings.
 *
 * | text | html | result                         |
 * |------|------|--------------------------------|
 * | yes  | yes  | alternative(plain, html)       |
 * | yes  | no   | plain                          |
 * | no   | yes  | html                           |
 * | no   | no   | ConfigError                    |
 */
export function composeBody(text: string | undefined, html: string | undefined): MessagePart {
  if (text !== undefined && html !== undefined) {
    return {
      type: 'multi',
      kind: 'alternative',
      children: [
        { type: 'single', kind: 'plain', content: text },
        { type: 'single', kind: 'html', content: html },
      ],
    };
  }
  if (text !== undefined) {
    return { type: 'single', kind: 'plain', content: text };
  }
  if (html !== undefined) {
    return { type: 'single', kind: 'html', content: html };
  }
  throw new ConfigError('provide --text and/or --html for message body');
}

/**
 * Wraps the body and its attachments in a mixed multipart, body first and
 * attachments in input order. Without attachments the body is returned as is.
 */
export function wrapWithAttachments(body: MessagePart, attachments: readonly AttachmentPart[]): MessagePart {
  if (attachments.length === 0) {
    return body;
  }
  return {
    type: 'multi',
    kind: 'mixed',
    children: [body, ...attachments],
  };
}
