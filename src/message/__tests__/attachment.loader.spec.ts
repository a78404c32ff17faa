import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { inferContentType, loadAttachment, loadAttachments } from '../attachment.loader';
import { ConfigError, IOError } from '../../shared/errors';
import { captureError } from '../../../test/helpers/capture-error';

describe('attachment loader', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'dispatch-attach-'));
    writeFileSync(join(dir, 'report.pdf'), 'PDF-DATA');
    writeFileSync(join(dir, 'notes.txt'), 'notes');
    writeFileSync(join(dir, 'blob.zzqx'), Buffer.from([0, 1, 2, 255]));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('loadAttachment', () => {
    it('should carry the filename, inferred type and raw bytes', () => {
      expect(loadAttachment(join(dir, 'report.pdf'))).toEqual({
        type: 'attachment',
        filename: 'report.pdf',
        contentType: 'application/pdf',
        content: Buffer.from('PDF-DATA'),
      });
    });

    it('should fall back to application/octet-stream for unknown extensions', () => {
      const part = loadAttachment(join(dir, 'blob.zzqx'));
      expect(part.contentType).toBe('application/octet-stream');
      expect(part.content).toEqual(Buffer.from([0, 1, 2, 255]));
    });

    it('should raise an IOError naming a missing file', () => {
      const path = join(dir, 'missing.csv');
      const error = captureError(() => loadAttachment(path));

      expect(error).toBeInstanceOf(IOError);
      expect(error).toMatchObject({ path, message: `failed to read attachment ${path}` });
      expect(error).toHaveProperty('cause.code', 'ENOENT');
    });

    it('should reject a path without a filename', () => {
      expect(() => loadAttachment('')).toThrow(ConfigError);
    });
  });

  describe('loadAttachments', () => {
    it('should keep input order', () => {
      const parts = loadAttachments([join(dir, 'notes.txt'), join(dir, 'report.pdf')]);
      expect(parts.map((part) => part.filename)).toEqual(['notes.txt', 'report.pdf']);
    });
  });

  describe('inferContentType', () => {
    it('should infer common types from the extension', () => {
      expect(inferContentType('notes.txt')).toBe('text/plain');
      expect(inferContentType('photo.png')).toBe('image/png');
    });

    it('should fall back for names without an extension', () => {
      expect(inferContentType('README')).toBe('application/octet-stream');
    });
  });
});
