import { registerAs } from '@nestjs/config';
import * as process from 'process';
import {
  CONFIG_NAMESPACE,
  DEFAULT_BACKOFF_FACTOR,
  DEFAULT_BACKOFF_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_SMTP_TIMEOUT_MS,
} from './config/config.constants';
import {
  parseFloatWithDefault,
  parseNumberWithDefault,
  parseOptionalString,
} from './config/config.parsers';
import type { DispatchConfiguration } from './config/config.types';

/**
 * Builds the retry defaults. Command-line flags override these values.
 *
 * Optional environment variables:
 * - MAIL_MAX_ATTEMPTS: Maximum SMTP send attempts (default: 3)
 * - MAIL_BACKOFF_MS: Initial backoff delay in milliseconds (default: 1000)
 * - MAIL_BACKOFF_FACTOR: Multiplier applied to the delay after each failure (default: 2)
 */
function buildRetryConfig(): DispatchConfiguration['retry'] {
  return {
    maxAttempts: parseNumberWithDefault(process.env.MAIL_MAX_ATTEMPTS, DEFAULT_MAX_ATTEMPTS),
    backoffMs: parseNumberWithDefault(process.env.MAIL_BACKOFF_MS, DEFAULT_BACKOFF_MS),
    backoffFactor: parseFloatWithDefault(process.env.MAIL_BACKOFF_FACTOR, DEFAULT_BACKOFF_FACTOR),
  };
}

/**
 * Builds SMTP client settings.
 *
 * Optional environment variables:
 * - MAIL_SMTP_TIMEOUT_MS: Connection, greeting and socket timeout (default: 30000)
 * - MAIL_CLIENT_NAME: Hostname announced in EHLO (default: the OS hostname)
 */
function buildSmtpConfig(): DispatchConfiguration['smtp'] {
  return {
    timeoutMs: parseNumberWithDefault(process.env.MAIL_SMTP_TIMEOUT_MS, DEFAULT_SMTP_TIMEOUT_MS),
    clientName: parseOptionalString(process.env.MAIL_CLIENT_NAME),
  };
}

/**
 * Register Config Dispatch
 *
 * MAIL_URL and MAIL_FROM are read here once and handed to the resolvers as
 * explicit inputs.
 */
export default registerAs(CONFIG_NAMESPACE, (): DispatchConfiguration => {
  return {
    mailUrl: parseOptionalString(process.env.MAIL_URL),
    mailFrom: parseOptionalString(process.env.MAIL_FROM),
    retry: buildRetryConfig(),
    smtp: buildSmtpConfig(),
  };
});
