/**
 * Builds the auth provider from raw option values.
 *
 * Values arrive from flags or environment variables already resolved by
 * the CLI layer; this module only calls the parsers and merges what they
 * return.
 */

import {
  AuthProvider,
  AuthType,
  createAuthProvider,
  parseBasicAuth,
  parseCookieString,
  parseCookiesFile,
  parseHeadersFile,
} from '../auth';
import type { AuthConfig, CredentialMap } from '../auth';
import { AuthValidationError } from '../errors/types';
import { logger } from '../utils/logger';

export interface AuthOptions {
  /** Bearer token (`--auth-bearer`). */
  bearer?: string;
  /** `username:password` (`--auth-basic`). */
  basic?: string;
  /** Raw Authorization header value (`--auth-header`). */
  authHeader?: string;
  headersFile?: string;
  cookiesFile?: string;
  /** Inline cookie string (`--cookie`). */
  cookie?: string;
  userAgent?: string;
}

function mergeInto(target: CredentialMap, source: CredentialMap): void {
  for (const [name, value] of source) {
    target.set(name, value);
  }
}

/** Header names compare case-insensitively; the newest spelling wins. */
function setHeader(headers: CredentialMap, name: string, value: string): void {
  const lower = name.toLowerCase();
  for (const existing of headers.keys()) {
    if (existing.toLowerCase() === lower) {
      headers.delete(existing);
    }
  }
  headers.set(name, value);
}

function hasAuthorization(headers: CredentialMap): boolean {
  return [...headers.keys()].some((name) => name.toLowerCase() === 'authorization');
}

/**
 * Assemble an AuthConfig. At most one primary credential may be given;
 * headers and cookies from every source are merged with later sources
 * winning on the same name.
 */
export function buildAuthConfig(options: AuthOptions): AuthConfig {
  const primaries = [options.bearer, options.basic, options.authHeader].filter(Boolean);
  if (primaries.length > 1) {
    throw new AuthValidationError(
      'multiple authentication methods specified (use only one of: --auth-bearer, --auth-basic, --auth-header)'
    );
  }

  let type = AuthType.NONE;
  let token: string | undefined;
  let username: string | undefined;
  let password: string | undefined;
  const headers: CredentialMap = new Map();
  const cookies: CredentialMap = new Map();

  if (options.bearer) {
    type = AuthType.BEARER;
    token = options.bearer;
  } else if (options.basic) {
    type = AuthType.BASIC;
    ({ username, password } = parseBasicAuth(options.basic));
  } else if (options.authHeader) {
    type = AuthType.CUSTOM;
    headers.set('Authorization', options.authHeader);
  }

  if (options.headersFile) {
    const fileHeaders = parseHeadersFile(options.headersFile);
    if (options.authHeader && hasAuthorization(fileHeaders)) {
      logger.warn(`Authorization from ${options.headersFile} replaces the --auth-header value`);
    }
    for (const [name, value] of fileHeaders) {
      setHeader(headers, name, value);
    }
    logger.debug(`Loaded ${fileHeaders.size} header(s) from ${options.headersFile}`);
  }

  if (options.userAgent) {
    setHeader(headers, 'User-Agent', options.userAgent);
  }

  if (options.cookiesFile) {
    const fileCookies = parseCookiesFile(options.cookiesFile);
    mergeInto(cookies, fileCookies);
    logger.debug(`Loaded ${fileCookies.size} cookie(s) from ${options.cookiesFile}`);
  }

  if (options.cookie) {
    const inlineCookies = parseCookieString(options.cookie);
    mergeInto(cookies, inlineCookies);
    logger.debug(`Parsed ${inlineCookies.size} cookie(s) from --cookie`);
  }

  if (type === AuthType.NONE && (headers.size > 0 || cookies.size > 0)) {
    type = AuthType.CUSTOM;
  }

  return { type, token, username, password, headers, cookies };
}

export function buildAuthProvider(options: AuthOptions): AuthProvider {
  return createAuthProvider(buildAuthConfig(options));
}
