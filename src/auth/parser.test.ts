import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { parseBasicAuth, parseCookieString, parseCookiesFile, parseHeadersFile } from './parser';
import {
  CredentialFormatError,
  CredentialIOError,
  EmptyCredentialsError,
  ErrorCode,
} from '../errors/types';

let tmpDir: string;

async function writeFixture(name: string, content: string): Promise<string> {
  const filePath = path.join(tmpDir, name);
  await fs.writeFile(filePath, content, 'utf8');
  return filePath;
}

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'parser-test-'));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('parseHeadersFile', () => {
  it('parses headers, skipping comments and blank lines', async () => {
    const file = await writeFixture('headers.txt', [
      'Authorization: Bearer token123',
      'X-API-Key: secret456',
      'X-Custom-Header: custom-value',
      '',
      '# This is a comment',
      'User-Agent: CustomBot/1.0',
      '',
    ].join('\n'));

    const headers = parseHeadersFile(file);

    expect(headers.size).toBe(4);
    expect(headers.get('Authorization')).toBe('Bearer token123');
    expect(headers.get('X-API-Key')).toBe('secret456');
    expect(headers.get('X-Custom-Header')).toBe('custom-value');
    expect(headers.get('User-Agent')).toBe('CustomBot/1.0');
  });

  it('splits on the first colon only', async () => {
    const file = await writeFixture('headers.txt', 'Referer: https://example.com:8443/path\n');

    expect(parseHeadersFile(file).get('Referer')).toBe('https://example.com:8443/path');
  });

  it('trims names and values and accepts CRLF line endings', async () => {
    const file = await writeFixture('headers.txt', '  X-One  :   1  \r\n\tX-Two:2\r\n');

    const headers = parseHeadersFile(file);

    expect([...headers.entries()]).toEqual([['X-One', '1'], ['X-Two', '2']]);
  });

  it('keeps an empty value', async () => {
    const file = await writeFixture('headers.txt', 'X-Empty:\n');

    expect(parseHeadersFile(file).get('X-Empty')).toBe('');
  });

  it('lets the later line win on duplicate names', async () => {
    const file = await writeFixture('headers.txt', 'X-Token: first\nX-Token: second\n');

    const headers = parseHeadersFile(file);

    expect(headers.size).toBe(1);
    expect(headers.get('X-Token')).toBe('second');
  });

  it('rejects a line without a colon, naming the line', async () => {
    const file = await writeFixture('headers.txt', 'Valid-Header: value\nInvalidHeaderWithoutColon\nAnother: v\n');

    let caught: unknown;
    try {
      parseHeadersFile(file);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CredentialFormatError);
    if (caught instanceof CredentialFormatError) {
      expect(caught.code).toBe(ErrorCode.FORMAT_ERROR);
      expect(caught.line).toBe(2);
      expect(caught.details).toEqual({ path: file, line: 2, text: 'InvalidHeaderWithoutColon' });
      expect(caught.message).toBe(
        `invalid header format at line 2 of ${file}: InvalidHeaderWithoutColon (expected 'Name: value')`
      );
    }
  });

  it('rejects an empty header name', async () => {
    const file = await writeFixture('headers.txt', '# comment\n: no-name\n');

    expect(() => parseHeadersFile(file)).toThrow(`empty header name at line 2 of ${file}`);
    expect(() => parseHeadersFile(file)).toThrow(CredentialFormatError);
  });

  it('fails when only comments and blank lines are present', async () => {
    const file = await writeFixture('headers.txt', '# nothing here\n\n   \n');

    expect(() => parseHeadersFile(file)).toThrow(EmptyCredentialsError);
    expect(() => parseHeadersFile(file)).toThrow(`no valid headers found in ${file}`);
  });

  it('fails with an IO error for a missing file', () => {
    const missing = path.join(tmpDir, 'missing.txt');

    expect(() => parseHeadersFile(missing)).toThrow(CredentialIOError);
    expect(() => parseHeadersFile(missing)).toThrow(/ENOENT/);
  });
});

describe('parseCookiesFile', () => {
  it('parses cookies, skipping comments and blank lines', async () => {
    const file = await writeFixture('cookies.txt', [
      'session=abc123def456',
      'token=xyz789',
      'user_id=12345',
      '',
      '# Comment line',
      'remember_me=true',
    ].join('\n'));

    const cookies = parseCookiesFile(file);

    expect(cookies.size).toBe(4);
    expect(cookies.get('session')).toBe('abc123def456');
    expect(cookies.get('token')).toBe('xyz789');
    expect(cookies.get('user_id')).toBe('12345');
    expect(cookies.get('remember_me')).toBe('true');
  });

  it('keeps "=" characters inside the value', async () => {
    const file = await writeFixture('cookies.txt', 'data = a=b==\n');

    expect(parseCookiesFile(file).get('data')).toBe('a=b==');
  });

  it('rejects a line without "=", naming the line', async () => {
    const file = await writeFixture('cookies.txt', 'valid=value\nInvalidCookieWithoutEquals\n');

    expect(() => parseCookiesFile(file)).toThrow(
      `invalid cookie format at line 2 of ${file}: InvalidCookieWithoutEquals (expected 'name=value')`
    );
  });

  it('rejects an empty cookie name', async () => {
    const file = await writeFixture('cookies.txt', '=orphan\n');

    expect(() => parseCookiesFile(file)).toThrow(`empty cookie name at line 1 of ${file}`);
  });

  it('fails on an empty file', async () => {
    const file = await writeFixture('cookies.txt', '');

    expect(() => parseCookiesFile(file)).toThrow(`no valid cookies found in ${file}`);
  });

  it('fails with an IO error when the path is a directory', () => {
    expect(() => parseCookiesFile(tmpDir)).toThrow(CredentialIOError);
  });
});

describe('parseCookieString', () => {
  it('parses semicolon-separated pairs', () => {
    const cookies = parseCookieString('session=abc123; token=xyz789');

    expect(Object.fromEntries(cookies)).toEqual({ session: 'abc123', token: 'xyz789' });
  });

  it('returns an empty map for an empty string', () => {
    expect(parseCookieString('').size).toBe(0);
  });

  it('tolerates whitespace around "=" and ";"', () => {
    const cookies = parseCookieString('  a = 1 ;b=2;;  ; c =3  ');

    expect(Object.fromEntries(cookies)).toEqual({ a: '1', b: '2', c: '3' });
  });

  it('drops segments without "=" or with an empty name', () => {
    const cookies = parseCookieString('flag; =nameless; ok=yes');

    expect(Object.fromEntries(cookies)).toEqual({ ok: 'yes' });
  });

  it('lets the later pair win on duplicate names', () => {
    expect(parseCookieString('id=1; id=2').get('id')).toBe('2');
  });
});

describe('parseBasicAuth', () => {
  it('splits username and password', () => {
    expect(parseBasicAuth('user:pass')).toEqual({ username: 'user', password: 'pass' });
  });

  it('only splits on the first colon', () => {
    expect(parseBasicAuth('user:pass:word:123')).toEqual({ username: 'user', password: 'pass:word:123' });
  });

  it('treats a string without a colon as a username with an empty password', () => {
    expect(parseBasicAuth('admin')).toEqual({ username: 'admin', password: '' });
  });

  it('allows an empty password after the colon', () => {
    expect(parseBasicAuth('admin:')).toEqual({ username: 'admin', password: '' });
  });

  it('rejects an empty string', () => {
    expect(() => parseBasicAuth('')).toThrow(CredentialFormatError);
    expect(() => parseBasicAuth('')).toThrow("invalid basic auth format (expected 'username:password')");
  });

  it('rejects an empty username', () => {
    expect(() => parseBasicAuth(':secret')).toThrow(CredentialFormatError);
  });
});
