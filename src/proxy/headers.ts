import { ProxyError } from "../errors.js";
import type { CookieJar, HeaderRecord } from "./types.js";

export const PUID_COOKIE = "_puid";
export const SENTINEL_CHAT_REQUIREMENTS_HEADER = "openai-sentinel-chat-requirements-token";
export const SENTINEL_ARKOSE_HEADER = "openai-sentinel-arkose-token";

const HEADER_VALUE_RE = /^[\t\x20-\x7e\x80-\xff]*$/;

const DROPPED_HEADERS = new Set([
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
  "host",
  "content-length",
]);

export function setHeader(headers: HeaderRecord, name: string, value: string): void {
  if (!HEADER_VALUE_RE.test(value)) {
    throw new ProxyError("invalid_header_value", `Invalid value for header ${name}`, { header: name });
  }
  headers[name.toLowerCase()] = value;
}

export function bearerToken(headers: HeaderRecord): string | undefined {
  const match = headers.authorization?.match(/^Bearer\s+(.+)$/i);
  const token = match?.[1]?.trim();
  return token ? token : undefined;
}

export function hasSessionCookie(headers: HeaderRecord): boolean {
  const cookie = headers.cookie;
  if (cookie === undefined) {
    return false;
  }
  if (!HEADER_VALUE_RE.test(cookie)) {
    throw new ProxyError("invalid_header_value", "Invalid value for header cookie", { header: "cookie" });
  }
  return cookie.includes(PUID_COOKIE);
}

function cookieNames(cookieHeader: string): Set<string> {
  const names = new Set<string>();
  for (const pair of cookieHeader.split(";")) {
    const name = pair.split("=", 1)[0]?.trim();
    if (name) {
      names.add(name);
    }
  }
  return names;
}

/**
 * Prepares inbound headers for the upstream: hop-by-hop headers are dropped,
 * origin/referer point at the upstream and the jar's cookies for the origin
 * are appended after any cookie the client already sent.
 */
export function convertHeaders(headers: HeaderRecord, jar: CookieJar, origin: string): HeaderRecord {
  const output: HeaderRecord = {};
  for (const [name, value] of Object.entries(headers)) {
    const lowered = name.toLowerCase();
    if (DROPPED_HEADERS.has(lowered)) {
      continue;
    }
    setHeader(output, lowered, value);
  }

  const originUrl = new URL(origin);
  setHeader(output, "origin", originUrl.origin);
  setHeader(output, "referer", `${originUrl.origin}/`);

  const existing = output.cookie?.trim() ?? "";
  const present = cookieNames(existing);
  const extra = jar
    .cookiesFor(originUrl)
    .filter((cookie) => !present.has(cookie.name))
    .map((cookie) => `${cookie.name}=${cookie.value}`);

  if (extra.length > 0) {
    const separator = existing.length === 0 || existing.endsWith(";") ? " " : "; ";
    const merged = existing.length === 0 ? extra.join("; ") : `${existing}${separator}${extra.join("; ")}`;
    setHeader(output, "cookie", merged);
  }

  return output;
}
