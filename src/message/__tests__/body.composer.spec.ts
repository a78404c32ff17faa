import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { composeBody, loadBodySources, wrapWithAttachments } from '../body.composer';
import type { AttachmentPart } from '../interfaces';
import { ConfigError, IOError } from '../../shared/errors';
import { captureError } from '../../../test/helpers/capture-error';

describe('loadBodySources', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'dispatch-body-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should use inline values', () => {
    expect(loadBodySources({ inline: 'hello' }, { inline: '<p>hello</p>' })).toEqual({
      text: 'hello',
      html: '<p>hello</p>',
    });
  });

  it('should read a body file as utf-8', () => {
    const path = join(dir, 'body.html');
    writeFileSync(path, '<p>Grüße</p>', 'utf-8');
    expect(loadBodySources({}, { file: path })).toEqual({ text: undefined, html: '<p>Grüße</p>' });
  });

  it('should leave a channel with no source absent', () => {
    expect(loadBodySources({}, {})).toEqual({ text: undefined, html: undefined });
  });

  it('should keep an empty inline value', () => {
    expect(loadBodySources({ inline: '' }, {}).text).toBe('');
  });

  it('should reject both an inline value and a file for the same channel', () => {
    expect(() => loadBodySources({ inline: 'x', file: '/tmp/x.txt' }, {})).toThrow(ConfigError);
    expect(() => loadBodySources({}, { inline: 'x', file: '/tmp/x.html' })).toThrow(
      'provide either --html or --html-file, not both',
    );
  });

  it('should raise an IOError naming the missing file', () => {
    const path = join(dir, 'missing.txt');
    const error = captureError(() => loadBodySources({ file: path }, {}));

    expect(error).toBeInstanceOf(IOError);
    expect(error).toMatchObject({ path, message: `failed to read text body from ${path}` });
  });

  it('should raise an IOError for a body file that is not valid utf-8', () => {
    const path = join(dir, 'latin1.html');
    writeFileSync(path, Buffer.from([0x66, 0xff, 0xfe]));

    const error = captureError(() => loadBodySources({}, { file: path }));

    expect(error).toBeInstanceOf(IOError);
    expect(error).toMatchObject({ path, message: `failed to read html body from ${path}` });
  });
});

describe('composeBody', () => {
  it('should build an alternative of plain then html when both are present', () => {
    expect(composeBody('hi', '<b>hi</b>')).toEqual({
      type: 'multi',
      kind: 'alternative',
      children: [
        { type: 'single', kind: 'plain', content: 'hi' },
        { type: 'single', kind: 'html', content: '<b>hi</b>' },
      ],
    });
  });

  it('should build a single plain part from text only', () => {
    expect(composeBody('hi', undefined)).toEqual({ type: 'single', kind: 'plain', content: 'hi' });
  });

  it('should build a single html part from html only', () => {
    expect(composeBody(undefined, '<b>hi</b>')).toEqual({ type: 'single', kind: 'html', content: '<b>hi</b>' });
  });

  it('should fail when neither body is present', () => {
    expect(() => composeBody(undefined, undefined)).toThrow(ConfigError);
    expect(() => composeBody(undefined, undefined)).toThrow('provide --text and/or --html for message body');
  });
});

describe('wrapWithAttachments', () => {
  const body = { type: 'single', kind: 'plain', content: 'hi' } as const;
  const attachment = (filename: string): AttachmentPart => ({
    type: 'attachment',
    filename,
    contentType: 'text/plain',
    content: Buffer.from(filename),
  });

  it('should return the body unchanged without attachments', () => {
    expect(wrapWithAttachments(body, [])).toBe(body);
  });

  it('should put the body first and attachments in input order', () => {
    const first = attachment('a.txt');
    const second = attachment('b.txt');
    expect(wrapWithAttachments(body, [first, second])).toEqual({
      type: 'multi',
      kind: 'mixed',
      children: [body, first, second],
    });
  });
});
