import { generateKeyPairSync } from 'crypto';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DkimSignerService } from '../dkim-signer.service';
import { loadDkimSettings } from '../dkim.config';

describe('DkimSignerService (real signer)', () => {
  let dir: string;
  let ed25519KeyPath: string;
  let rsaKeyPath: string;
  const service = new DkimSignerService();
  const raw = Buffer.from(
    ['From: sender@example.com', 'To: rcpt@example.com', 'Subject: Signed', '', 'Hello there', ''].join('\r\n'),
  );

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'dispatch-dkim-sign-'));

    ed25519KeyPath = join(dir, 'ed25519.pem');
    writeFileSync(
      ed25519KeyPath,
      generateKeyPairSync('ed25519', {
        publicKeyEncoding: { type: 'spki', format: 'pem' },
        privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
      }).privateKey,
    );

    rsaKeyPath = join(dir, 'rsa.pem');
    writeFileSync(
      rsaKeyPath,
      generateKeyPairSync('rsa', {
        modulusLength: 2048,
        publicKeyEncoding: { type: 'spki', format: 'pem' },
        privateKeyEncoding: { type: 'pkcs1', format: 'pem' },
      }).privateKey,
    );
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should sign with an Ed25519 key loaded from disk', async () => {
    const settings = loadDkimSettings({
      selector: 'mail2024',
      domain: 'example.com',
      keyPath: ed25519KeyPath,
      algorithm: 'ed25519',
    });
    if (!settings) {
      throw new Error('expected DKIM settings');
    }

    const signed = (await service.sign(raw, settings)).toString('utf-8');

    expect(signed.startsWith('DKIM-Signature:')).toBe(true);
    expect(signed).toContain('a=ed25519-sha256;');
    expect(signed).toMatch(/d=example\.com;/);
    expect(signed).toMatch(/s=mail2024;/);
    expect(signed.endsWith(raw.toString('utf-8'))).toBe(true);
  });

  it('should sign with a PKCS#1 RSA key loaded from disk', async () => {
    const settings = loadDkimSettings({ selector: 'rsa1', domain: 'example.com', keyPath: rsaKeyPath });
    if (!settings) {
      throw new Error('expected DKIM settings');
    }

    const signed = (await service.sign(raw, settings)).toString('utf-8');

    expect(signed.startsWith('DKIM-Signature:')).toBe(true);
    expect(signed).toContain('a=rsa-sha256;');
    expect(signed).toMatch(/s=rsa1;/);
    expect(signed.endsWith(raw.toString('utf-8'))).toBe(true);
  });
});
