export interface ProxyConfig {
  version: string;
  httpHost: string;
  httpPort: number;
  httpBodyLimit: string;

  upstreamOrigin: string;
  sentinelOrigin: string;
  upstreamHeadersTimeoutMs: number;
  upstreamBodyTimeoutMs: number;
  upstreamCookies: UpstreamCookie[];

  arkoseSolverUrl: string;
  arkoseGpt3Experiment: boolean;
  puidCacheTtlSec: number;

  logLevel: "debug" | "info" | "warn" | "error";
  logFormat: "json" | "pretty";
}

export interface UpstreamCookie {
  name: string;
  value: string;
}

const DEFAULT_UPSTREAM_ORIGIN = "https://chatgpt.com";

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const lowered = value.trim().toLowerCase();
  if (["1", "true", "yes", "y", "on"].includes(lowered)) return true;
  if (["0", "false", "no", "n", "off"].includes(lowered)) return false;
  return fallback;
}

function parseNumber(value: string | undefined, fallback: number, min = 0): number {
  if (value === undefined) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || Number.isNaN(parsed)) return fallback;
  return Math.max(parsed, min);
}

function parseLogLevel(value: string | undefined): ProxyConfig["logLevel"] {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return "info";
}

function parseLogFormat(value: string | undefined): ProxyConfig["logFormat"] {
  if (value === "pretty" || value === "json") {
    return value;
  }
  return "json";
}

function normalizeOrigin(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    return fallback;
  }
  return trimmed.replace(/\/+$/, "");
}

export function parseCookieList(value: string | undefined): UpstreamCookie[] {
  if (!value) {
    return [];
  }

  return value
    .split(";")
    .map((pair) => pair.trim())
    .filter((pair) => pair.length > 0)
    .map((pair) => {
      const separator = pair.indexOf("=");
      if (separator <= 0) return null;
      return { name: pair.slice(0, separator).trim(), value: pair.slice(separator + 1).trim() };
    })
    .filter((cookie): cookie is UpstreamCookie => cookie !== null && cookie.name.length > 0);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProxyConfig {
  const upstreamOrigin = normalizeOrigin(env.UPSTREAM_ORIGIN, DEFAULT_UPSTREAM_ORIGIN);

  return {
    version: env.PROXY_VERSION || "1.0.0",
    httpHost: env.HTTP_HOST || "127.0.0.1",
    httpPort: parseNumber(env.HTTP_PORT, 7999, 1),
    httpBodyLimit: env.HTTP_BODY_LIMIT || "10mb",

    upstreamOrigin,
    sentinelOrigin: normalizeOrigin(env.SENTINEL_ORIGIN, upstreamOrigin),
    upstreamHeadersTimeoutMs: parseNumber(env.UPSTREAM_HEADERS_TIMEOUT_MS, 60_000, 1),
    upstreamBodyTimeoutMs: parseNumber(env.UPSTREAM_BODY_TIMEOUT_MS, 600_000, 1),
    upstreamCookies: parseCookieList(env.UPSTREAM_COOKIES),

    arkoseSolverUrl: env.ARKOSE_SOLVER_URL?.trim() || "",
    arkoseGpt3Experiment: parseBoolean(env.ARKOSE_GPT3_EXPERIMENT, false),
    puidCacheTtlSec: parseNumber(env.PUID_CACHE_TTL_SEC, 3600, 1),

    logLevel: parseLogLevel(env.LOG_LEVEL),
    logFormat: parseLogFormat(env.LOG_FORMAT),
  };
}

function assertUrl(name: string, value: string): void {
  try {
    new URL(value);
  } catch {
    throw new Error(`${name} must be an absolute URL, got "${value}"`);
  }
}

export function validateConfig(config: ProxyConfig): void {
  assertUrl("UPSTREAM_ORIGIN", config.upstreamOrigin);
  assertUrl("SENTINEL_ORIGIN", config.sentinelOrigin);
  if (config.arkoseSolverUrl) {
    assertUrl("ARKOSE_SOLVER_URL", config.arkoseSolverUrl);
  }
}
