import type { AuthTarget } from './types';

export interface Cookie {
  name: string;
  value: string;
}

interface HeaderEntry {
  name: string;
  value: string;
}

export function formatCookieHeader(cookies: readonly Cookie[]): string {
  return cookies.map((cookie) => `${cookie.name}=${cookie.value}`).join('; ');
}

/**
 * In-memory outgoing request. Each worker owns its own instance; the
 * transport turns it into a real HTTP call.
 */
export class AuthRequest implements AuthTarget {
  readonly url: string;
  private readonly headerEntries = new Map<string, HeaderEntry>();
  private readonly cookieJar: Cookie[] = [];

  constructor(url: string, headers: Readonly<Record<string, string>> = {}) {
    this.url = url;
    for (const [name, value] of Object.entries(headers)) {
      this.setHeader(name, value);
    }
  }

  getHeader(name: string): string | undefined {
    return this.headerEntries.get(name.toLowerCase())?.value;
  }

  setHeader(name: string, value: string): void {
    this.headerEntries.set(name.toLowerCase(), { name, value });
  }

  addCookie(name: string, value: string): void {
    this.cookieJar.push({ name, value });
  }

  cookies(): Cookie[] {
    return this.cookieJar.map((cookie) => ({ ...cookie }));
  }

  /**
   * Headers as sent, with cookies folded into a single `Cookie` header
   * after any `Cookie` header set explicitly.
   */
  headers(): Record<string, string> {
    const result: Record<string, string> = {};
    let cookieName = 'Cookie';
    const cookieParts: string[] = [];

    for (const [key, entry] of this.headerEntries) {
      if (key === 'cookie') {
        cookieName = entry.name;
        cookieParts.push(entry.value);
        continue;
      }
      result[entry.name] = entry.value;
    }

    if (this.cookieJar.length > 0) {
      cookieParts.push(formatCookieHeader(this.cookieJar));
    }
    if (cookieParts.length > 0) {
      result[cookieName] = cookieParts.join('; ');
    }

    return result;
  }
}
