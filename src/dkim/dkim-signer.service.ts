import { Injectable, Logger } from '@nestjs/common';
import type { DKIMSignOptions, DKIMSignResult } from 'mailauth';
import { dkimSign } from 'mailauth/lib/dkim/sign';
import { DEFAULT_DKIM_CANONICALIZATION } from '../config/config.constants';
import { getErrorMessage } from '../shared/error.utils';
import { CryptoError } from '../shared/errors';
import type { DkimAlgorithm, DkimSettings } from './interfaces';

const SIGNING_ALGORITHMS = {
  rsa: 'rsa-sha256',
  ed25519: 'ed25519-sha256',
} as const satisfies Record<DkimAlgorithm, string>;

/**
 * Signs fully built messages with DKIM.
 *
 * Signing runs once per message, over the final bytes; the signed result is
 * what every delivery attempt sends.
 */
@Injectable()
export class DkimSignerService {
  private readonly logger = new Logger(DkimSignerService.name);

  /**
   * Prepends a DKIM-Signature header to the raw message.
   *
   * @throws {CryptoError} If the signer reports an error or produces no signature
   */
  async sign(raw: Buffer, settings: DkimSettings): Promise<Buffer> {
    this.logger.verbose(
      `Applying DKIM signature (d=${settings.domain}, s=${settings.selector}, a=${SIGNING_ALGORITHMS[settings.algorithm]})`,
    );

    const options: DKIMSignOptions = {
      canonicalization: DEFAULT_DKIM_CANONICALIZATION,
      signatureData: [
        {
          signingDomain: settings.domain,
          selector: settings.selector,
          privateKey: settings.privateKey,
          algorithm: SIGNING_ALGORITHMS[settings.algorithm],
        },
      ],
    };

    let result: DKIMSignResult;
    try {
      result = await dkimSign(raw, options);
    } catch (error) {
      throw new CryptoError(`DKIM signing failed: ${getErrorMessage(error)}`, { cause: error });
    }

    const [failure] = result.errors ?? [];
    if (failure !== undefined) {
      const cause = signerErrorOf(failure);
      throw new CryptoError(`DKIM signing failed: ${getErrorMessage(cause)}`, { cause });
    }
    if (!result.signatures) {
      throw new CryptoError('DKIM signing produced no signature');
    }

    const header = result.signatures.endsWith('\r\n') ? result.signatures : `${result.signatures}\r\n`;
    return Buffer.concat([Buffer.from(header, 'utf-8'), raw]);
  }
}

// Signer error entries carry the underlying error in `err`
function signerErrorOf(entry: unknown): unknown {
  return typeof entry === 'object' && entry !== null && 'err' in entry ? entry.err : entry;
}
