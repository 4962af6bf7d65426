import { AppError, AuthValidationError, ErrorCode } from '../errors/types';
import { AuthType } from './types';
import type {
  AuthConfig,
  AuthTarget,
  CredentialSource,
  RequestDecorator,
} from './types';

const AUTHORIZATION = 'authorization';
const BEARER_PREFIX = 'bearer ';
const AUTH_TYPES: readonly AuthType[] = Object.values(AuthType);

function isReadonlyMap(source: CredentialSource): source is ReadonlyMap<string, string> {
  return source instanceof Map;
}

/**
 * Copy a mapping into a Map nobody else holds a reference to.
 */
function freezeEntries(source: CredentialSource | undefined): ReadonlyMap<string, string> {
  if (!source) {
    return new Map();
  }
  return new Map(isReadonlyMap(source) ? source : Object.entries(source));
}

function countEntries(source: CredentialSource | undefined): number {
  if (!source) {
    return 0;
  }
  return isReadonlyMap(source) ? source.size : Object.keys(source).length;
}

/**
 * Convert a type name coming from flags or a config file.
 */
export function parseAuthType(value: string): AuthType {
  const normalized = value.trim().toLowerCase();
  const type = AUTH_TYPES.find((candidate) => candidate === normalized);
  if (!type) {
    throw new AuthValidationError(`unsupported authentication type: ${value}`, { type: value });
  }
  return type;
}

/**
 * Check that the populated fields match the declared type.
 */
export function validateAuthConfig(config: AuthConfig): void {
  const type: AuthType = config.type;
  switch (type) {
    case AuthType.NONE:
      return;
    case AuthType.BEARER:
      if (!config.token) {
        throw new AuthValidationError('token is required for bearer authentication', { type });
      }
      return;
    case AuthType.BASIC:
      if (!config.username) {
        throw new AuthValidationError('username is required for basic authentication', { type });
      }
      return;
    case AuthType.CUSTOM:
      if (countEntries(config.headers) === 0 && countEntries(config.cookies) === 0) {
        throw new AuthValidationError('headers or cookies required for custom authentication', { type });
      }
      return;
    default:
      throw new AuthValidationError(`unsupported authentication type: ${String(type)}`, {
        type: String(type),
      });
  }
}

/**
 * Decorates outgoing requests with the configured credentials.
 *
 * Built once from a validated config and frozen; one instance is shared by
 * every download worker. `apply` only writes to the target it is given.
 */
export class AuthProvider implements RequestDecorator {
  readonly type: AuthType;
  private readonly token: string;
  private readonly username: string;
  private readonly password: string;
  private readonly headers: ReadonlyMap<string, string>;
  private readonly cookies: ReadonlyMap<string, string>;

  constructor(config: AuthConfig) {
    validateAuthConfig(config);

    this.type = config.type;
    this.token = config.token ?? '';
    this.username = config.username ?? '';
    this.password = config.password ?? '';
    this.headers = freezeEntries(config.headers);
    this.cookies = freezeEntries(config.cookies);
    Object.freeze(this);
  }

  get headerCount(): number {
    return this.headers.size;
  }

  get cookieCount(): number {
    return this.cookies.size;
  }

  /**
   * Primary credential first, then header overlay, then cookies. An
   * overlay `Authorization` header never replaces one already present.
   */
  apply(target: AuthTarget): void {
    switch (this.type) {
      case AuthType.BEARER:
        this.applyBearer(target);
        break;
      case AuthType.BASIC:
        this.applyBasic(target);
        break;
      default:
        break;
    }

    this.applyHeaders(target);
    this.applyCookies(target);
  }

  private applyBearer(target: AuthTarget): void {
    if (!this.token) {
      throw new AppError('bearer token is empty', ErrorCode.AUTH_APPLY_FAILED, { type: this.type });
    }

    const value = this.token.toLowerCase().startsWith(BEARER_PREFIX)
      ? this.token
      : `Bearer ${this.token}`;
    target.setHeader('Authorization', value);
  }

  private applyBasic(target: AuthTarget): void {
    if (!this.username) {
      throw new AppError('username is required for basic auth', ErrorCode.AUTH_APPLY_FAILED, {
        type: this.type,
      });
    }

    const encoded = Buffer.from(`${this.username}:${this.password}`, 'utf8').toString('base64');
    target.setHeader('Authorization', `Basic ${encoded}`);
  }

  private applyHeaders(target: AuthTarget): void {
    for (const [name, value] of this.headers) {
      if (name.toLowerCase() === AUTHORIZATION && target.getHeader(name)) {
        continue;
      }
      target.setHeader(name, value);
    }
  }

  private applyCookies(target: AuthTarget): void {
    for (const [name, value] of this.cookies) {
      target.addCookie(name, value);
    }
  }
}

/**
 * Stands in for a provider when no authentication is configured.
 */
export const NO_AUTH: RequestDecorator = Object.freeze({
  type: AuthType.NONE,
  apply(): void {
    // nothing to add
  },
});

/**
 * Validate a config and build its provider.
 */
export function createAuthProvider(config: AuthConfig): AuthProvider {
  return new AuthProvider(config);
}

/**
 * Resolve an optional provider once, at the call site, so request code can
 * call `apply` unconditionally.
 */
export function resolveAuth(provider: RequestDecorator | null | undefined): RequestDecorator {
  return provider ?? NO_AUTH;
}
