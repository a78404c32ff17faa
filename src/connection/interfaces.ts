/**
 * `plain` connects unencrypted and upgrades with STARTTLS when offered;
 * `tls-wrapper` negotiates TLS before the SMTP greeting (implicit TLS).
 */
export type ConnectionSecurity = 'plain' | 'tls-wrapper';

export interface Credentials {
  user: string;
  pass: string;
}

/**
 * Validated SMTP target. When `auth` is present both fields are non-empty.
 */
export interface ConnectionDescriptor {
  readonly host: string;
  readonly port: number;
  readonly auth?: Readonly<Credentials>;
  readonly security: ConnectionSecurity;
}

/**
 * Inputs to connection resolution. `envDsn` is the MAIL_URL value.
 */
export interface ConnectionInputs {
  dsn?: string;
  envDsn?: string;
  host?: string;
  port?: number;
  user?: string;
  pass?: string;
  security?: ConnectionSecurity;
}
