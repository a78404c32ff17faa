import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CONFIG_NAMESPACE, DEFAULT_BACKOFF_FACTOR, DEFAULT_BACKOFF_MS, DEFAULT_MAX_ATTEMPTS } from '../config/config.constants';
import type { DispatchConfiguration } from '../config/config.types';
import { resolveConnection } from '../connection/connection.resolver';
import type { ConnectionDescriptor } from '../connection/interfaces';
import type { MailTransport, RetryPolicy } from '../delivery/interfaces';
import { RetryExecutor, validateRetryPolicy } from '../delivery/retry.executor';
import { DkimSignerService } from '../dkim/dkim-signer.service';
import { assertDkimOptionsComplete, loadDkimSettings } from '../dkim/dkim.config';
import { parseMailbox, parseMailboxes, resolveSender } from '../message/address.utils';
import { loadAttachments } from '../message/attachment.loader';
import { composeBody, loadBodySources, wrapWithAttachments } from '../message/body.composer';
import { parseHeaderLines } from '../message/header.utils';
import type { ComposedMessage, RenderedContent } from '../message/interfaces';
import { MessageBuilderService } from '../message/message-builder.service';
import { parseTemplateVariables, renderTemplate } from '../template/template.utils';
import { ConfigError } from '../shared/errors';
import { MAIL_TRANSPORT } from './mailer.constants';
import type { DispatchHooks, DispatchRequest, DispatchResult } from './interfaces';

/**
 * Runs one invocation end to end.
 *
 * Stages run strictly in order: upfront checks, variables, body sources,
 * rendering, connection, sender, composition, byte building, DKIM signing,
 * then print and/or send. Every file is read and every value validated
 * before the first network call; only the send itself is retried, always
 * with the same signed bytes.
 */
@Injectable()
export class MailerService {
  private readonly logger = new Logger(MailerService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly messageBuilder: MessageBuilderService,
    private readonly dkimSigner: DkimSignerService,
    private readonly retryExecutor: RetryExecutor,
    @Inject(MAIL_TRANSPORT) private readonly transport: MailTransport,
  ) {}

  async dispatch(request: DispatchRequest, hooks: DispatchHooks = {}): Promise<DispatchResult> {
    const policy = this.retryPolicyFor(request);
    validateRetryPolicy(policy);
    assertDkimOptionsComplete(request.dkim);

    const vars = parseTemplateVariables(request.vars);
    const sources = loadBodySources(request.text, request.html);
    const rendered: RenderedContent = {
      subject: renderTemplate(request.subject, vars),
      text: sources.text === undefined ? undefined : renderTemplate(sources.text, vars),
      html: sources.html === undefined ? undefined : renderTemplate(sources.html, vars),
      headers: request.headers.map((header) => renderTemplate(header, vars)),
    };

    const connection = resolveConnection({
      ...request.connection,
      envDsn: this.configService.get<string>(`${CONFIG_NAMESPACE}.mailUrl`),
    });
    const sender = resolveSender(request.from, this.configService.get<string>(`${CONFIG_NAMESPACE}.mailFrom`));

    const message = this.compose(request, rendered, sender);
    const envelope = this.messageBuilder.envelopeOf(message);

    let raw = await this.messageBuilder.build(message);
    const dkim = loadDkimSettings(request.dkim);
    if (dkim) {
      raw = await this.dkimSigner.sign(raw, dkim);
    }

    if (request.printMode !== 'off') {
      hooks.onPrint?.(raw);
    }
    if (request.printMode === 'print') {
      return { raw, sent: false, attempts: 0 };
    }

    this.logger.verbose(`Sending to ${this.describeTarget(connection)} for ${envelope.to.length} recipient(s)`);
    const outcome = await this.retryExecutor.execute(
      () => this.transport.send(connection, envelope, raw, { verbose: request.verbose }),
      policy,
    );

    return { raw, sent: true, attempts: outcome.attempts, receipt: outcome.result };
  }

  private compose(request: DispatchRequest, rendered: RenderedContent, sender: string): ComposedMessage {
    if (request.to.length === 0) {
      throw new ConfigError('provide at least one --to recipient');
    }

    const from = parseMailbox(sender);
    const to = parseMailboxes(request.to);
    const cc = parseMailboxes(request.cc);
    const bcc = parseMailboxes(request.bcc);
    const headers = parseHeaderLines(rendered.headers);
    const attachments = loadAttachments(request.attachments);
    const body = wrapWithAttachments(composeBody(rendered.text, rendered.html), attachments);

    return { from, to, cc, bcc, subject: rendered.subject, headers, body };
  }

  private retryPolicyFor(request: DispatchRequest): RetryPolicy {
    const defaults = this.configService.get<DispatchConfiguration['retry']>(`${CONFIG_NAMESPACE}.retry`);

    return {
      maxAttempts: request.retry.maxAttempts ?? defaults?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
      initialDelayMs: request.retry.backoffMs ?? defaults?.backoffMs ?? DEFAULT_BACKOFF_MS,
      factor: request.retry.backoffFactor ?? defaults?.backoffFactor ?? DEFAULT_BACKOFF_FACTOR,
    };
  }

  private describeTarget(connection: ConnectionDescriptor): string {
    const user = connection.auth ? `${connection.auth.user}@` : '';
    return `${user}${connection.host}:${connection.port} (${connection.security})`;
  }
}
