import { DEFAULT_SMTP_PORT, DEFAULT_SMTPS_PORT } from '../config/config.constants';
import { parseOptionalString } from '../config/config.parsers';
import { ConfigError, ParseError } from '../shared/errors';
import type { ConnectionDescriptor, ConnectionInputs, ConnectionSecurity, Credentials } from './interfaces';

const SCHEME_SECURITY: ReadonlyMap<string, ConnectionSecurity> = new Map<string, ConnectionSecurity>([
  ['smtp', 'plain'],
  ['smtps', 'tls-wrapper'],
]);

const DEFAULT_PORTS: Readonly<Record<ConnectionSecurity, number>> = {
  plain: DEFAULT_SMTP_PORT,
  'tls-wrapper': DEFAULT_SMTPS_PORT,
};

/**
 * Resolves the SMTP target.
 *
 * Precedence (first match wins): the `--dsn` argument, the MAIL_URL value,
 * then the discrete host/port/user/pass flags. Blank values count as absent.
 *
 * @throws {ConfigError} When the discrete path is missing host, user or pass
 * @throws {ParseError} When the selected DSN is malformed
 */
export function resolveConnection(inputs: ConnectionInputs): ConnectionDescriptor {
  const dsn = parseOptionalString(inputs.dsn) ?? parseOptionalString(inputs.envDsn);
  if (dsn !== undefined) {
    return parseDsn(dsn);
  }
  return resolveFromFlags(inputs);
}

/**
 * Parses `smtp[s]://[user:pass@]host[:port]`.
 *
 * A value without `://` is read as `smtp://<value>`. Any scheme other than
 * smtp or smtps is rejected. The scheme selects the security mode and the
 * default port (587 for smtp, 465 for smtps).
 */
export function parseDsn(dsn: string): ConnectionDescriptor {
  const trimmed = dsn.trim();
  const normalized = trimmed.includes('://') ? trimmed : `smtp://${trimmed}`;

  let url: URL;
  try {
    url = new URL(normalized);
  } catch (error) {
    throw new ParseError('invalid DSN: expected smtp[s]://[user:pass@]host[:port]', { cause: error });
  }

  const scheme = url.protocol.replace(/:$/, '').toLowerCase();
  const security = SCHEME_SECURITY.get(scheme);
  if (!security) {
    throw new ParseError(`unsupported DSN scheme "${scheme}" (expected smtp or smtps)`);
  }

  const host = stripIpv6Brackets(url.hostname);
  if (!host) {
    throw new ParseError('DSN must include host');
  }

  const port = url.port ? Number(url.port) : DEFAULT_PORTS[security];
  if (!isValidPort(port)) {
    throw new ParseError(`invalid DSN port: ${url.port}`);
  }

  const user = decodeComponent(url.username);
  let auth: Credentials | undefined;
  if (user) {
    const pass = decodeComponent(url.password);
    if (!pass) {
      throw new ParseError('DSN must include password when username is provided');
    }
    auth = { user, pass };
  }

  return { host, port, auth, security };
}

function resolveFromFlags(inputs: ConnectionInputs): ConnectionDescriptor {
  const host = parseOptionalString(inputs.host)?.trim();
  if (!host) {
    throw new ConfigError('--host is required when --dsn is not provided');
  }
  const user = parseOptionalString(inputs.user);
  if (!user) {
    throw new ConfigError('--user is required when --dsn is not provided');
  }
  const pass = parseOptionalString(inputs.pass);
  if (!pass) {
    throw new ConfigError('--pass is required when --dsn is not provided');
  }

  const port = inputs.port ?? DEFAULT_SMTP_PORT;
  if (!isValidPort(port)) {
    throw new ConfigError(`--port must be between 1 and 65535, got ${port}`);
  }

  return {
    host,
    port,
    auth: { user, pass },
    security: inputs.security ?? 'tls-wrapper',
  };
}

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

function stripIpv6Brackets(hostname: string): string {
  return hostname.startsWith('[') && hostname.endsWith(']') ? hostname.slice(1, -1) : hostname;
}

function decodeComponent(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch (error) {
    throw new ParseError('DSN credentials contain an invalid percent-encoding', { cause: error });
  }
}
