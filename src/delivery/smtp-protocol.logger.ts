import { Logger } from '@nestjs/common';
import { format } from 'util';
import type { SmtpProtocolLogger } from './interfaces';

/**
 * Adapts the SMTP client's bunyan-style calls (`meta, format, ...args`) to a
 * Nest logger. Everything lands at `debug` except warnings and errors.
 */
export class NestSmtpProtocolLogger implements SmtpProtocolLogger {
  constructor(private readonly logger: Logger) {}

  level(level: string): void {
    this.logger.verbose(`SMTP client requested log level ${level}`);
  }

  trace(...params: unknown[]): void {
    this.logger.debug(this.render(params));
  }

  debug(...params: unknown[]): void {
    this.logger.debug(this.render(params));
  }

  info(...params: unknown[]): void {
    this.logger.debug(this.render(params));
  }

  warn(...params: unknown[]): void {
    this.logger.warn(this.render(params));
  }

  error(...params: unknown[]): void {
    this.logger.error(this.render(params));
  }

  fatal(...params: unknown[]): void {
    this.logger.error(this.render(params));
  }

  private render(params: unknown[]): string {
    const [first, ...rest] = params;
    // first argument is a metadata object when a format string follows
    if (typeof first === 'object' && first !== null && typeof rest[0] === 'string') {
      return format(...rest);
    }
    return format(...params);
  }
}
