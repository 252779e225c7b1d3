import type { Cookie, CookieJar } from "./types.js";

interface StoredCookie extends Cookie {
  domain: string;
  path: string;
  hostOnly: boolean;
}

export interface CookieScope {
  /** Leading dot (or `hostOnly: false`) also matches subdomains. */
  domain: string;
  path?: string;
  hostOnly?: boolean;
}

function domainMatches(host: string, cookie: StoredCookie): boolean {
  if (host === cookie.domain) {
    return true;
  }
  return !cookie.hostOnly && host.endsWith(`.${cookie.domain}`);
}

function pathMatches(requestPath: string, cookiePath: string): boolean {
  if (requestPath === cookiePath) {
    return true;
  }
  if (!requestPath.startsWith(cookiePath)) {
    return false;
  }
  return cookiePath.endsWith("/") || requestPath.charAt(cookiePath.length) === "/";
}

export class MemoryCookieJar implements CookieJar {
  private readonly cookies: StoredCookie[] = [];

  public set(cookie: Cookie, scope: CookieScope): void {
    const rawDomain = scope.domain.trim().toLowerCase();
    const domain = rawDomain.replace(/^\./, "");
    const path = scope.path ?? "/";
    const hostOnly = scope.hostOnly ?? !rawDomain.startsWith(".");

    const index = this.cookies.findIndex(
      (entry) => entry.name === cookie.name && entry.domain === domain && entry.path === path,
    );
    const stored: StoredCookie = { name: cookie.name, value: cookie.value, domain, path, hostOnly };
    if (index === -1) {
      this.cookies.push(stored);
    } else {
      this.cookies[index] = stored;
    }
  }

  public cookiesFor(url: URL): Cookie[] {
    const host = url.hostname.toLowerCase();
    const path = url.pathname || "/";
    return this.cookies
      .filter((cookie) => domainMatches(host, cookie) && pathMatches(path, cookie.path))
      .sort((a, b) => b.path.length - a.path.length)
      .map((cookie) => ({ name: cookie.name, value: cookie.value }));
  }
}

/** Jar holding the configured upstream cookies, host-scoped to the origin. */
export function createUpstreamCookieJar(origin: string, cookies: Cookie[]): MemoryCookieJar {
  const jar = new MemoryCookieJar();
  const domain = new URL(origin).hostname;
  for (const cookie of cookies) {
    jar.set(cookie, { domain, path: "/", hostOnly: true });
  }
  return jar;
}
