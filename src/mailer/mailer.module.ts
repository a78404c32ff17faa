/* v8 ignore start - NestJS module definition */
import { Module } from '@nestjs/common';
import { RetryExecutor } from '../delivery/retry.executor';
import { SmtpTransportService } from '../delivery/smtp-transport.service';
import { DkimSignerService } from '../dkim/dkim-signer.service';
import { MessageBuilderService } from '../message/message-builder.service';
import { MAIL_TRANSPORT } from './mailer.constants';
import { MailerService } from './mailer.service';

/**
 * Module for composing, signing and delivering a single message.
 *
 * Dependencies:
 * - ConfigModule: MAIL_* defaults (provided globally)
 */
@Module({
  providers: [
    MailerService,
    MessageBuilderService,
    DkimSignerService,
    RetryExecutor,
    SmtpTransportService,
    {
      provide: MAIL_TRANSPORT,
      useExisting: SmtpTransportService,
    },
  ],
  exports: [MailerService],
})
export class MailerModule {}
/* v8 ignore stop */
