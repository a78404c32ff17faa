import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import SMTPConnection from 'nodemailer/lib/smtp-connection';
import { CONFIG_NAMESPACE, DEFAULT_SMTP_TIMEOUT_MS } from '../config/config.constants';
import type { ConnectionDescriptor } from '../connection/interfaces';
import type { MessageEnvelope } from '../message/interfaces';
import type {
  MailTransport,
  SendOptions,
  SendReceipt,
  SmtpClient,
  SmtpClientFactory,
  SmtpClientOptions,
} from './interfaces';
import { NestSmtpProtocolLogger } from './smtp-protocol.logger';

export const SMTP_CLIENT_FACTORY = Symbol('SMTP_CLIENT_FACTORY');

export const createSmtpClient: SmtpClientFactory = (options) => new SMTPConnection(options);

/**
 * Sends prepared message bytes over one SMTP session per call.
 *
 * `tls-wrapper` connects with implicit TLS; `plain` connects in the clear and
 * upgrades with STARTTLS when the server offers it. The session is closed on
 * every path.
 */
@Injectable()
export class SmtpTransportService implements MailTransport {
  private readonly logger = new Logger(SmtpTransportService.name);
  private readonly createClient: SmtpClientFactory;

  constructor(
    private readonly configService: ConfigService,
    @Optional() @Inject(SMTP_CLIENT_FACTORY) clientFactory?: SmtpClientFactory,
  ) {
    this.createClient = clientFactory ?? createSmtpClient;
  }

  async send(
    connection: ConnectionDescriptor,
    envelope: MessageEnvelope,
    raw: Buffer,
    options: SendOptions = {},
  ): Promise<SendReceipt> {
    this.logger.verbose(`Connecting to ${connection.host}:${connection.port} (${connection.security})`);

    const client = this.createClient(this.clientOptionsFor(connection, options.verbose ?? false));
    const failure = this.failureOf(client);
    try {
      const receipt = await Promise.race([failure, this.runSession(client, connection, envelope, raw)]);
      client.quit();
      this.logger.verbose(`Server accepted ${receipt.accepted.length} recipient(s): ${receipt.response}`);
      return receipt;
    } finally {
      client.close();
    }
  }

  private clientOptionsFor(connection: ConnectionDescriptor, verbose: boolean): SmtpClientOptions {
    const timeoutMs = this.configService.get<number>(`${CONFIG_NAMESPACE}.smtp.timeoutMs`, DEFAULT_SMTP_TIMEOUT_MS);
    const clientName = this.configService.get<string>(`${CONFIG_NAMESPACE}.smtp.clientName`);

    return {
      host: connection.host,
      port: connection.port,
      secure: connection.security === 'tls-wrapper',
      name: clientName,
      connectionTimeout: timeoutMs,
      greetingTimeout: timeoutMs,
      socketTimeout: timeoutMs,
      logger: verbose ? new NestSmtpProtocolLogger(this.logger) : false,
    };
  }

  private async runSession(
    client: SmtpClient,
    connection: ConnectionDescriptor,
    envelope: MessageEnvelope,
    raw: Buffer,
  ): Promise<SendReceipt> {
    await this.connect(client);
    if (connection.auth) {
      await this.login(client, connection.auth.user, connection.auth.pass);
    }
    return this.transmit(client, envelope, raw);
  }

  /**
   * Rejects when the client reports an error outside a command callback, or
   * the server drops the connection before the session completes.
   */
  private failureOf(client: SmtpClient): Promise<never> {
    return new Promise<never>((_resolve, reject) => {
      client.on('error', reject);
      client.once('end', () => reject(new Error('SMTP connection closed unexpectedly')));
    });
  }

  private async connect(client: SmtpClient): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      client.connect((error?: Error | null) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  private async login(client: SmtpClient, user: string, pass: string): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      client.login({ type: 'LOGIN', user, credentials: { user, pass }, method: false }, (error?: Error | null) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  private async transmit(client: SmtpClient, envelope: MessageEnvelope, raw: Buffer): Promise<SendReceipt> {
    return new Promise<SendReceipt>((resolve, reject) => {
      client.send(envelope, raw, (error: Error | null | undefined, info: SendReceipt) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(info);
      });
    });
  }
}
