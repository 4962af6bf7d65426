/**
 * Authentication module.
 *
 * Barrel export for credential parsers, the auth provider and the request
 * targets it can decorate.
 */

export { AuthType } from './types';
export type {
  AuthConfig,
  AuthTarget,
  BasicCredentials,
  CredentialMap,
  CredentialSource,
  RequestDecorator,
} from './types';

export { parseHeadersFile, parseCookiesFile, parseCookieString, parseBasicAuth } from './parser';

export {
  AuthProvider,
  NO_AUTH,
  createAuthProvider,
  parseAuthType,
  resolveAuth,
  validateAuthConfig,
} from './provider';

export { AuthRequest, formatCookieHeader } from './request';
export type { Cookie } from './request';

export { AxiosAuthTarget, attachAuth, DEFAULT_USER_AGENT } from './axios';
export type { AttachAuthOptions } from './axios';
