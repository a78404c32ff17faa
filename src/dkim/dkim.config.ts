import { createPrivateKey, type KeyObject } from 'crypto';
import { readFileSync } from 'fs';
import { parseOptionalString } from '../config/config.parsers';
import { ConfigError, CryptoError, IOError } from '../shared/errors';
import type { DkimAlgorithm, DkimOptions, DkimSettings } from './interfaces';

// PKCS#8 DER header for a bare 32-byte Ed25519 seed (RFC 8410)
const ED25519_PKCS8_PREFIX = Buffer.from('302e020100300506032b657004220420', 'hex');
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

const EXPECTED_KEY_TYPES: Readonly<Record<DkimAlgorithm, string>> = {
  rsa: 'rsa',
  ed25519: 'ed25519',
};

interface DkimTriple {
  selector: string;
  domain: string;
  keyPath: string;
}

/**
 * Checks that selector, domain and key path are all present or all absent.
 * Reads nothing from disk.
 *
 * @returns The triple when all three are set, `undefined` when none are
 * @throws {ConfigError} On any partial combination
 */
export function assertDkimOptionsComplete(options: DkimOptions): DkimTriple | undefined {
  const selector = parseOptionalString(options.selector);
  const domain = parseOptionalString(options.domain);
  const keyPath = parseOptionalString(options.keyPath);

  if (selector === undefined && domain === undefined && keyPath === undefined) {
    return undefined;
  }
  if (selector === undefined || domain === undefined || keyPath === undefined) {
    throw new ConfigError('--dkim-selector, --dkim-domain, and --dkim-key must be provided together');
  }
  return { selector, domain, keyPath };
}

/**
 * Builds the DKIM signing configuration, or `undefined` when DKIM is not
 * requested and the message goes out unsigned.
 *
 * @throws {ConfigError} When only some of selector, domain and key are given
 * @throws {IOError} When the key file cannot be read
 * @throws {CryptoError} When the key does not suit the algorithm
 */
export function loadDkimSettings(options: DkimOptions): DkimSettings | undefined {
  const triple = assertDkimOptionsComplete(options);
  if (!triple) {
    return undefined;
  }

  const algorithm = options.algorithm ?? 'rsa';

  let material: string;
  try {
    material = readFileSync(triple.keyPath, 'utf-8');
  } catch (error) {
    throw new IOError(`failed to read DKIM key ${triple.keyPath}`, triple.keyPath, { cause: error });
  }

  const key = parseSigningKey(material, algorithm);

  return {
    selector: triple.selector,
    domain: triple.domain,
    privateKey: key.export({ format: 'pem', type: 'pkcs8' }).toString(),
    algorithm,
  };
}

/**
 * Parses DKIM key material.
 *
 * RSA keys are PEM (PKCS#1 or PKCS#8). Ed25519 keys are PEM (PKCS#8) or a
 * base64 raw seed: 32 bytes, or 64 bytes of seed followed by the public key.
 *
 * @throws {CryptoError} When the material is malformed or of another key type
 */
export function parseSigningKey(material: string, algorithm: DkimAlgorithm): KeyObject {
  const trimmed = material.trim();
  const isPem = trimmed.includes('-----BEGIN');

  if (!isPem && algorithm === 'rsa') {
    throw new CryptoError('failed to parse DKIM signing key: RSA keys must be PEM encoded');
  }

  let key: KeyObject;
  try {
    key = isPem ? createPrivateKey(trimmed) : createEd25519KeyFromSeed(trimmed);
  } catch (error) {
    throw new CryptoError(`failed to parse DKIM signing key for ${algorithm}`, { cause: error });
  }

  if (key.asymmetricKeyType !== EXPECTED_KEY_TYPES[algorithm]) {
    throw new CryptoError(
      `DKIM key type ${key.asymmetricKeyType ?? 'unknown'} does not match algorithm ${algorithm}`,
    );
  }

  return key;
}

function createEd25519KeyFromSeed(encoded: string): KeyObject {
  const compact = encoded.replace(/\s+/g, '');
  if (!BASE64_PATTERN.test(compact)) {
    throw new Error('Ed25519 key is neither PEM nor base64');
  }

  const bytes = Buffer.from(compact, 'base64');
  if (bytes.length !== 32 && bytes.length !== 64) {
    throw new Error(`Ed25519 seed must be 32 or 64 bytes, got ${bytes.length}`);
  }

  return createPrivateKey({
    key: Buffer.concat([ED25519_PKCS8_PREFIX, bytes.subarray(0, 32)]),
    format: 'der',
    type: 'pkcs8',
  });
}
