/**
 * Message model
 *
 * A message is assembled bottom-up from validated leaves: parts and header
 * fields are collected first, then a single {@link ComposedMessage} value is
 * constructed. Nothing here is mutated after construction.
 *
 * @module message-interfaces
 */

export interface BodySources {
  text?: string;
  html?: string;
}

/**
 * All user text after template substitution.
 */
export interface RenderedContent {
  subject: string;
  text?: string;
  html?: string;
  headers: string[];
}

export type SinglePartKind = 'plain' | 'html';
export type MultiPartKind = 'alternative' | 'mixed';

export interface SinglePart {
  readonly type: 'single';
  readonly kind: SinglePartKind;
  readonly content: string;
}

export interface AttachmentPart {
  readonly type: 'attachment';
  readonly filename: string;
  readonly contentType: string;
  readonly content: Buffer;
}

export interface MultiPart {
  readonly type: 'multi';
  readonly kind: MultiPartKind;
  readonly children: readonly MessagePart[];
}

export type MessagePart = SinglePart | AttachmentPart | MultiPart;

export interface HeaderField {
  readonly name: string;
  readonly value: string;
}

export interface Mailbox {
  readonly name: string;
  readonly address: string;
}

export interface ComposedMessage {
  readonly from: Mailbox;
  readonly to: readonly Mailbox[];
  readonly cc: readonly Mailbox[];
  readonly bcc: readonly Mailbox[];
  readonly subject: string;
  /** User-supplied headers, applied in order before the subject */
  readonly headers: readonly HeaderField[];
  readonly body: MessagePart;
}

/**
 * SMTP envelope: the MAIL FROM address and every RCPT TO address
 * (to, cc and bcc together).
 */
export interface MessageEnvelope {
  from: string;
  to: string[];
}
