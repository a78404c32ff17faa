/**
 * Error taxonomy for the dispatch pipeline.
 *
 * Every failure raised while composing or delivering a message is one of
 * these classes. Composition errors (config, parse, io, crypto) are fatal
 * and raised before any network activity; only {@link TransportError}
 * results from the retry loop.
 */

export type DispatchErrorKind = 'config' | 'parse' | 'io' | 'crypto' | 'transport' | 'usage';

/**
 * Base class for all dispatch failures.
 */
export abstract class DispatchError extends Error {
  abstract readonly kind: DispatchErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing or contradictory configuration.
 */
export class ConfigError extends DispatchError {
  readonly kind = 'config';
}

/**
 * Malformed user-supplied syntax (DSN, mailbox, header line).
 */
export class ParseError extends DispatchError {
  readonly kind = 'parse';
}

/**
 * Failure reading a body source, attachment or DKIM key file.
 */
export class IOError extends DispatchError {
  readonly kind = 'io';
  public readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.path = path;
  }
}

/**
 * DKIM key material that cannot be used for the declared algorithm.
 */
export class CryptoError extends DispatchError {
  readonly kind = 'crypto';
}

/**
 * Final failure of the send loop. `cause` holds the last transport error.
 */
export class TransportError extends DispatchError {
  readonly kind = 'transport';
  public readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options);
    this.attempts = attempts;
  }
}

/**
 * Unknown flag, missing flag value or malformed flag token. Exits with code 2.
 */
export class CliUsageError extends DispatchError {
  readonly kind = 'usage';
}
