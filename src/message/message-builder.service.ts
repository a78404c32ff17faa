import { Injectable, Logger } from '@nestjs/common';
import MimeNode from 'nodemailer/lib/mime-node';
import { formatMailbox } from './address.utils';
import type { ComposedMessage, MessageEnvelope, MessagePart, Mailbox } from './interfaces';

const SINGLE_PART_CONTENT_TYPES = {
  plain: 'text/plain; charset=utf-8',
  html: 'text/html; charset=utf-8',
} as const;

/**
 * Turns a composed message into RFC 5322 bytes and its SMTP envelope.
 *
 * The part tree maps one-to-one onto MIME nodes; boundaries, transfer
 * encodings, Date, Message-ID and MIME-Version are left to the MIME encoder.
 * Bcc recipients appear in the envelope only.
 */
@Injectable()
export class MessageBuilderService {
  private readonly logger = new Logger(MessageBuilderService.name);

  async build(message: ComposedMessage): Promise<Buffer> {
    const root = new MimeNode(this.contentTypeOf(message.body), this.optionsOf(message.body));

    root.setHeader('From', formatMailbox(message.from));
    this.setAddressHeader(root, 'To', message.to);
    this.setAddressHeader(root, 'Cc', message.cc);
    this.setAddressHeader(root, 'Bcc', message.bcc);

    for (const header of message.headers) {
      root.addHeader(header.name, header.value);
    }
    root.setHeader('Subject', message.subject);

    this.fill(root, message.body);

    const raw = await new Promise<Buffer>((resolve, reject) => {
      root.build((error: Error | null, buffer: Buffer) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(buffer);
      });
    });

    this.logger.debug(`Built message of ${raw.length} bytes`);
    return raw;
  }

  envelopeOf(message: ComposedMessage): MessageEnvelope {
    return {
      from: message.from.address,
      to: [...message.to, ...message.cc, ...message.bcc].map((mailbox) => mailbox.address),
    };
  }

  private setAddressHeader(node: MimeNode, key: string, mailboxes: readonly Mailbox[]): void {
    if (mailboxes.length > 0) {
      node.setHeader(key, mailboxes.map(formatMailbox).join(', '));
    }
  }

  private fill(node: MimeNode, part: MessagePart): void {
    switch (part.type) {
      case 'single':
      case 'attachment':
        node.setContent(part.content);
        return;
      case 'multi':
        for (const child of part.children) {
          this.fill(node.createChild(this.contentTypeOf(child), this.optionsOf(child)), child);
        }
        return;
    }
  }

  private contentTypeOf(part: MessagePart): string {
    switch (part.type) {
      case 'single':
        return SINGLE_PART_CONTENT_TYPES[part.kind];
      case 'attachment':
        return part.contentType;
      case 'multi':
        return `multipart/${part.kind}`;
    }
  }

  private optionsOf(part: MessagePart): { filename?: string } {
    return part.type === 'attachment' ? { filename: part.filename } : {};
  }
}
