import type { ConnectionInputs } from '../connection/interfaces';
import type { SendReceipt } from '../delivery/interfaces';
import type { DkimOptions } from '../dkim/interfaces';
import type { BodyChannelInput } from '../message/body.composer';

/**
 * `print` writes the message and never contacts the server;
 * `print-and-send` writes it, then sends.
 */
export type PrintMode = 'off' | 'print' | 'print-and-send';

export interface RetryOverrides {
  maxAttempts?: number;
  backoffMs?: number;
  backoffFactor?: number;
}

/**
 * Everything one invocation asks for. Unset retry values fall back to the
 * environment-backed configuration.
 */
export interface DispatchRequest {
  connection: Omit<ConnectionInputs, 'envDsn'>;
  from?: string;
  to: string[];
  cc: string[];
  bcc: string[];
  subject: string;
  text: BodyChannelInput;
  html: BodyChannelInput;
  attachments: string[];
  headers: string[];
  vars: string[];
  printMode: PrintMode;
  verbose: boolean;
  retry: RetryOverrides;
  dkim: DkimOptions;
}

export interface DispatchHooks {
  /** Receives the final message bytes in the print modes, before any send */
  onPrint?: (raw: Buffer) => void;
}

export interface DispatchResult {
  raw: Buffer;
  sent: boolean;
  /** Zero when nothing was sent */
  attempts: number;
  receipt?: SendReceipt;
}
