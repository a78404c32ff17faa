import { parseArgs } from 'util';
import type { ConnectionSecurity } from '../connection/interfaces';
import { DKIM_ALGORITHMS, type DkimAlgorithm } from '../dkim/interfaces';
import type { DispatchRequest, PrintMode } from '../mailer/interfaces';
import { getErrorMessage } from '../shared/error.utils';
import { CliUsageError } from '../shared/errors';

const CLI_OPTIONS = {
  dsn: { type: 'string' },
  host: { type: 'string' },
  port: { type: 'string' },
  user: { type: 'string' },
  pass: { type: 'string' },
  security: { type: 'string' },
  from: { type: 'string' },
  to: { type: 'string', multiple: true },
  cc: { type: 'string', multiple: true },
  bcc: { type: 'string', multiple: true },
  subject: { type: 'string' },
  text: { type: 'string' },
  'text-file': { type: 'string' },
  html: { type: 'string' },
  'html-file': { type: 'string' },
  attach: { type: 'string', multiple: true },
  header: { type: 'string', multiple: true },
  var: { type: 'string', multiple: true },
  print: { type: 'boolean' },
  'print-and-send': { type: 'boolean' },
  verbose: { type: 'boolean' },
  'max-attempts': { type: 'string' },
  'backoff-ms': { type: 'string' },
  'backoff-factor': { type: 'string' },
  'dkim-selector': { type: 'string' },
  'dkim-domain': { type: 'string' },
  'dkim-key': { type: 'string' },
  'dkim-algorithm': { type: 'string' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'V' },
} as const;

const SECURITY_FLAGS: ReadonlyMap<string, ConnectionSecurity> = new Map<string, ConnectionSecurity>([
  ['plain', 'plain'],
  ['tls', 'tls-wrapper'],
]);

const UNSIGNED_INTEGER_PATTERN = /^\d+$/;
const MAX_PORT = 65_535;
const MAX_UINT32 = 4_294_967_295;

export type CliCommand = { kind: 'help' } | { kind: 'version' } | { kind: 'dispatch'; request: DispatchRequest };

/**
 * Parses command-line arguments (without the node and script entries).
 *
 * Only token-level problems are reported here: unknown flags, missing
 * values, malformed numbers and enumerations. Semantic checks such as
 * connection resolution happen in the dispatch pipeline.
 *
 * @throws {CliUsageError}
 */
export function parseCliArguments(argv: readonly string[]): CliCommand {
  const values = tokenize(argv);

  if (values.help) {
    return { kind: 'help' };
  }
  if (values.version) {
    return { kind: 'version' };
  }

  const to = values.to ?? [];
  if (to.length === 0) {
    throw new CliUsageError('missing required option --to');
  }

  return {
    kind: 'dispatch',
    request: {
      connection: {
        dsn: values.dsn,
        host: values.host,
        port: parseBoundedInteger('--port', values.port, MAX_PORT),
        user: values.user,
        pass: values.pass,
        security: parseSecurity(values.security),
      },
      from: values.from,
      to,
      cc: values.cc ?? [],
      bcc: values.bcc ?? [],
      subject: values.subject ?? '',
      text: { inline: values.text, file: values['text-file'] },
      html: { inline: values.html, file: values['html-file'] },
      attachments: values.attach ?? [],
      headers: values.header ?? [],
      vars: values.var ?? [],
      printMode: parsePrintMode(values.print ?? false, values['print-and-send'] ?? false),
      verbose: values.verbose ?? false,
      retry: {
        maxAttempts: parseBoundedInteger('--max-attempts', values['max-attempts'], MAX_UINT32),
        backoffMs: parseBoundedInteger('--backoff-ms', values['backoff-ms'], Number.MAX_SAFE_INTEGER),
        backoffFactor: parseFactor(values['backoff-factor']),
      },
      dkim: {
        selector: values['dkim-selector'],
        domain: values['dkim-domain'],
        keyPath: values['dkim-key'],
        algorithm: parseDkimAlgorithm(values['dkim-algorithm']),
      },
    },
  };
}

function tokenize(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: CLI_OPTIONS, strict: true, allowPositionals: false }).values;
  } catch (error) {
    throw new CliUsageError(getErrorMessage(error), { cause: error });
  }
}

function parseBoundedInteger(flag: string, raw: string | undefined, max: number): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!UNSIGNED_INTEGER_PATTERN.test(raw) || value > max) {
    throw new CliUsageError(`invalid value "${raw}" for ${flag}: expected an integer between 0 and ${max}`);
  }
  return value;
}

function parseFactor(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new CliUsageError(`invalid value "${raw}" for --backoff-factor: expected a number`);
  }
  return value;
}

function parseSecurity(raw: string | undefined): ConnectionSecurity | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const security = SECURITY_FLAGS.get(raw);
  if (!security) {
    throw new CliUsageError(`invalid value "${raw}" for --security: expected plain or tls`);
  }
  return security;
}

function parseDkimAlgorithm(raw: string | undefined): DkimAlgorithm | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const algorithm = DKIM_ALGORITHMS.find((candidate) => candidate === raw);
  if (!algorithm) {
    throw new CliUsageError(`invalid value "${raw}" for --dkim-algorithm: expected ${DKIM_ALGORITHMS.join(' or ')}`);
  }
  return algorithm;
}

function parsePrintMode(print: boolean, printAndSend: boolean): PrintMode {
  if (print && printAndSend) {
    throw new CliUsageError('--print and --print-and-send cannot be used together');
  }
  if (printAndSend) {
    return 'print-and-send';
  }
  return print ? 'print' : 'off';
}
