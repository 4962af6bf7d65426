/**
 * Credential parsers.
 *
 * File parsers are strict: the first malformed line aborts the parse with a
 * line-numbered error, and a file with no entries is an error. String
 * parsers are lenient: malformed cookie segments are dropped and an empty
 * cookie string yields an empty map. Only an empty basic-auth string fails.
 */

import * as fs from 'fs';
import {
  CredentialFormatError,
  CredentialIOError,
  EmptyCredentialsError,
} from '../errors/types';
import type { BasicCredentials, CredentialMap } from './types';

interface LineGrammar {
  /** Singular noun used in messages ("header", "cookie"). */
  noun: string;
  separator: string;
  expected: string;
}

const HEADER_GRAMMAR: LineGrammar = { noun: 'header', separator: ':', expected: 'Name: value' };
const COOKIE_GRAMMAR: LineGrammar = { noun: 'cookie', separator: '=', expected: 'name=value' };

/** Split on the first occurrence of `separator`; null when absent. */
function splitFirst(text: string, separator: string): [string, string] | null {
  const index = text.indexOf(separator);
  if (index === -1) {
    return null;
  }
  return [text.slice(0, index), text.slice(index + separator.length)];
}

function readLines(filePath: string): string[] {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    const cause = error instanceof Error ? error.message : String(error);
    throw new CredentialIOError(filePath, cause);
  }
  return content.split(/\r?\n/);
}

function parseCredentialFile(filePath: string, grammar: LineGrammar): CredentialMap {
  const entries: CredentialMap = new Map();
  const lines = readLines(filePath);

  for (let i = 0; i < lines.length; i++) {
    const lineNumber = i + 1;
    const line = lines[i].trim();

    if (line === '' || line.startsWith('#')) {
      continue;
    }

    const parts = splitFirst(line, grammar.separator);
    if (!parts) {
      throw new CredentialFormatError(
        `invalid ${grammar.noun} format at line ${lineNumber} of ${filePath}: ${line} (expected '${grammar.expected}')`,
        { path: filePath, line: lineNumber, text: line }
      );
    }

    const name = parts[0].trim();
    const value = parts[1].trim();

    if (name === '') {
      throw new CredentialFormatError(
        `empty ${grammar.noun} name at line ${lineNumber} of ${filePath}`,
        { path: filePath, line: lineNumber, text: line }
      );
    }

    entries.set(name, value);
  }

  if (entries.size === 0) {
    throw new EmptyCredentialsError(`no valid ${grammar.noun}s found in ${filePath}`, filePath);
  }

  return entries;
}

/**
 * Parse a headers file with one `Name: value` per line.
 */
export function parseHeadersFile(filePath: string): CredentialMap {
  return parseCredentialFile(filePath, HEADER_GRAMMAR);
}

/**
 * Parse a cookies file with one `name=value` per line.
 */
export function parseCookiesFile(filePath: string): CredentialMap {
  return parseCredentialFile(filePath, COOKIE_GRAMMAR);
}

/**
 * Parse a cookie header string: `name1=value1; name2=value2`.
 */
export function parseCookieString(cookieString: string): CredentialMap {
  const cookies: CredentialMap = new Map();

  for (const segment of cookieString.split(';')) {
    const pair = segment.trim();
    if (pair === '') {
      continue;
    }

    const parts = splitFirst(pair, '=');
    if (!parts) {
      continue;
    }

    const name = parts[0].trim();
    if (name !== '') {
      cookies.set(name, parts[1].trim());
    }
  }

  return cookies;
}

/**
 * Parse `username` or `username:password`. Only the first colon separates;
 * the password may contain more.
 */
export function parseBasicAuth(authString: string): BasicCredentials {
  const parts = splitFirst(authString, ':');
  const username = parts ? parts[0] : authString;

  if (username === '') {
    throw new CredentialFormatError("invalid basic auth format (expected 'username:password')");
  }

  return { username, password: parts ? parts[1] : '' };
}
