/**
 * Plugs a request decorator into an axios instance.
 *
 * The transport owns the axios instance and every request config that
 * flows through it; this module only writes headers onto those configs.
 */

import type { AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import type { AuthTarget, RequestDecorator } from './types';

export const DEFAULT_USER_AGENT = 'downurl/1.0';

export interface AttachAuthOptions {
  /** Sent when neither the request nor the decorator supplies one. */
  userAgent?: string;
}

export class AxiosAuthTarget implements AuthTarget {
  constructor(private readonly config: InternalAxiosRequestConfig) {}

  getHeader(name: string): string | undefined {
    const value = this.config.headers.get(name);
    if (typeof value === 'string') {
      return value;
    }
    if (Array.isArray(value)) {
      return value.join(name.toLowerCase() === 'cookie' ? '; ' : ', ');
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
      return String(value);
    }
    return undefined;
  }

  setHeader(name: string, value: string): void {
    this.config.headers.set(name, value);
  }

  addCookie(name: string, value: string): void {
    const pair = `${name}=${value}`;
    const existing = this.getHeader('Cookie');
    this.config.headers.set('Cookie', existing ? `${existing}; ${pair}` : pair);
  }
}

/**
 * Register a request interceptor that sets the default User-Agent and then
 * applies the decorator. Returns the interceptor id for `eject`.
 */
export function attachAuth(
  instance: AxiosInstance,
  decorator: RequestDecorator,
  options: AttachAuthOptions = {}
): number {
  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;

  return instance.interceptors.request.use((config) => {
    const target = new AxiosAuthTarget(config);
    if (!target.getHeader('User-Agent')) {
      target.setHeader('User-Agent', userAgent);
    }
    decorator.apply(target);
    return config;
  });
}
