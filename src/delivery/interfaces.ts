import type { ConnectionDescriptor } from '../connection/interfaces';
import type { MessageEnvelope } from '../message/interfaces';

export interface RetryPolicy {
  maxAttempts: number;
  /** Delay before the second attempt; floored at 1ms */
  initialDelayMs: number;
  /** Growth applied after each failure; values below 1 act as 1 */
  factor: number;
}

export interface RetryState {
  attempt: number;
  delayMs: number;
}

export interface RetryOutcome<T> {
  result: T;
  attempts: number;
}

export type SleepFn = (ms: number) => Promise<void>;

export interface SendReceipt {
  accepted: string[];
  rejected: string[];
  response: string;
}

export interface SendOptions {
  /** Log the SMTP conversation through the application logger */
  verbose?: boolean;
}

/**
 * Username/password login. `method: false` lets the client pick the first
 * mechanism the server advertises.
 */
export interface SmtpLoginAuth {
  type: 'LOGIN';
  user: string;
  credentials: { user: string; pass: string };
  method: false;
}

/**
 * The slice of an SMTP client connection the transport drives.
 */
export interface SmtpClient {
  connect(callback: (error?: Error | null) => void): void;
  login(auth: SmtpLoginAuth, callback: (error?: Error | null) => void): void;
  send(
    envelope: MessageEnvelope,
    message: Buffer,
    callback: (error: Error | null | undefined, info: SendReceipt) => void,
  ): void;
  quit(): void;
  close(): void;
  on(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'end', listener: () => void): unknown;
}

export interface SmtpClientOptions {
  host: string;
  port: number;
  secure: boolean;
  name?: string;
  connectionTimeout: number;
  greetingTimeout: number;
  socketTimeout: number;
  logger: SmtpProtocolLogger | false;
}

/**
 * Level-per-method logger accepted by the SMTP client for protocol traces.
 */
export interface SmtpProtocolLogger {
  level(level: string): void;
  trace(...params: unknown[]): void;
  debug(...params: unknown[]): void;
  info(...params: unknown[]): void;
  warn(...params: unknown[]): void;
  error(...params: unknown[]): void;
  fatal(...params: unknown[]): void;
}

export type SmtpClientFactory = (options: SmtpClientOptions) => SmtpClient;

/**
 * A single delivery attempt. Implementations open, use and close their own
 * connection; any rejection counts as a failed attempt.
 */
export interface MailTransport {
  send(
    connection: ConnectionDescriptor,
    envelope: MessageEnvelope,
    raw: Buffer,
    options?: SendOptions,
  ): Promise<SendReceipt>;
}
