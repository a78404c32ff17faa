import { readFileSync } from 'fs';
import { basename } from 'path';
import { detectMimeType } from 'nodemailer/lib/mime-funcs/mime-types';
import { DEFAULT_ATTACHMENT_CONTENT_TYPE } from '../config/config.constants';
import { ConfigError, IOError } from '../shared/errors';
import type { AttachmentPart } from './interfaces';

const MIME_TYPE_PATTERN = /^[A-Za-z0-9][A-Za-z0-9!#$&^_.+-]*\/[A-Za-z0-9][A-Za-z0-9!#$&^_.+-]*$/;

/**
 * Reads an attachment into memory and infers its content type from the
 * filename extension, falling back to application/octet-stream.
 *
 * @throws {ConfigError} When the path has no usable filename, or the inferred
 * type is not a valid `type/subtype`
 * @throws {IOError} When the file cannot be read
 */
export function loadAttachment(path: string): AttachmentPart {
  const filename = basename(path);
  if (!filename || filename === '.' || filename === '..') {
    throw new ConfigError(`attachment must have a valid filename: ${path}`);
  }

  let content: Buffer;
  try {
    content = readFileSync(path);
  } catch (error) {
    throw new IOError(`failed to read attachment ${path}`, path, { cause: error });
  }

  const contentType = inferContentType(filename);
  if (!MIME_TYPE_PATTERN.test(contentType)) {
    throw new ConfigError(`invalid MIME type for attachment: ${contentType}`);
  }

  return { type: 'attachment', filename, contentType, content };
}

export function loadAttachments(paths: readonly string[]): AttachmentPart[] {
  return paths.map(loadAttachment);
}

/**
 * Best-guess content type for a filename.
 */
export function inferContentType(filename: string): string {
  return detectMimeType(filename) || DEFAULT_ATTACHMENT_CONTENT_TYPE;
}
