export type DkimAlgorithm = 'rsa' | 'ed25519';

export const DKIM_ALGORITHMS: readonly DkimAlgorithm[] = ['rsa', 'ed25519'];

/**
 * DKIM options as given on the command line. All three of selector, domain
 * and keyPath are set together or not at all.
 */
export interface DkimOptions {
  selector?: string;
  domain?: string;
  keyPath?: string;
  algorithm?: DkimAlgorithm;
}

/**
 * Complete signing configuration. `privateKey` is PKCS#8 PEM.
 */
export interface DkimSettings {
  readonly selector: string;
  readonly domain: string;
  readonly privateKey: string;
  readonly algorithm: DkimAlgorithm;
}
