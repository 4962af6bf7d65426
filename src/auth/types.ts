/**
 * Authentication types shared by the parsers, the provider and the
 * request targets.
 */

export enum AuthType {
  NONE = 'none',
  BEARER = 'bearer',
  BASIC = 'basic',
  CUSTOM = 'custom',
}

/** Name → value pairs; later entries overwrite earlier ones. */
export type CredentialMap = Map<string, string>;

/** Mappings may be handed in as a Map or as a plain record. */
export type CredentialSource = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

export interface AuthConfig {
  readonly type: AuthType;
  /** Bearer token, with or without the "Bearer " prefix. */
  readonly token?: string;
  readonly username?: string;
  /** May be empty; some servers accept a bare username. */
  readonly password?: string;
  readonly headers?: CredentialSource;
  readonly cookies?: CredentialSource;
}

export interface BasicCredentials {
  username: string;
  password: string;
}

/**
 * Anything an auth decorator can write to. Header names are
 * case-insensitive; cookies accumulate.
 */
export interface AuthTarget {
  getHeader(name: string): string | undefined;
  setHeader(name: string, value: string): void;
  addCookie(name: string, value: string): void;
}

/**
 * The single runtime operation. Implemented by AuthProvider and by the
 * no-op decorator used when no authentication is configured.
 */
export interface RequestDecorator {
  readonly type: AuthType;

  /** Decorate the target in place. Throws on the first failing step. */
  apply(target: AuthTarget): void;
}
