import { createHash } from "node:crypto";
import { text } from "node:stream/consumers";
import type { Logger } from "pino";
import { ProxyError, toProxyError } from "../errors.js";
import { PUID_COOKIE } from "../proxy/headers.js";
import { stripBearer } from "../proxy/sentinel.js";
import type { HttpClient, SessionIdCache, UpstreamResponse } from "../proxy/types.js";
import { KeyedSingleFlight } from "../utils/singleFlight.js";

export interface PuidAcquirer {
  acquire(credential: string, model: string): Promise<string | undefined>;
}

interface CacheEntry {
  puid: string;
  expiresAt: number;
}

export interface PuidCacheOptions {
  acquirer: PuidAcquirer;
  ttlMs: number;
  logger?: Logger;
  now?: () => number;
}

export function reduceKey(credential: string): string {
  return createHash("sha256").update(stripBearer(credential)).digest("hex");
}

export function readSetCookie(headers: UpstreamResponse["headers"], name: string): string | undefined {
  const raw = headers["set-cookie"];
  const lines = Array.isArray(raw) ? raw : raw === undefined ? [] : [raw];
  for (const line of lines) {
    const pair = line.split(";", 1)[0] ?? "";
    const separator = pair.indexOf("=");
    if (separator <= 0) continue;
    if (pair.slice(0, separator).trim() === name) {
      const value = pair.slice(separator + 1).trim();
      return value.length > 0 ? value : undefined;
    }
  }
  return undefined;
}

/**
 * Session id cache keyed by `reduceKey(credential)`. Only successful lookups
 * are stored; concurrent misses for one key share a single acquisition.
 */
export class PuidCache implements SessionIdCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly flights = new KeyedSingleFlight<string | undefined>();
  private readonly acquirer: PuidAcquirer;
  private readonly ttlMs: number;
  private readonly logger?: Logger;
  private readonly now: () => number;

  public constructor(options: PuidCacheOptions) {
    this.acquirer = options.acquirer;
    this.ttlMs = options.ttlMs;
    this.logger = options.logger;
    this.now = options.now ?? (() => Date.now());
  }

  public get(cacheKey: string): string | undefined {
    const entry = this.entries.get(cacheKey);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(cacheKey);
      return undefined;
    }
    return entry.puid;
  }

  public async getOrInit(credential: string, model: string, cacheKey: string): Promise<string | undefined> {
    const cached = this.get(cacheKey);
    if (cached !== undefined) {
      return cached;
    }

    return this.flights.run(cacheKey, async () => {
      let puid: string | undefined;
      try {
        puid = await this.acquirer.acquire(credential, model);
      } catch (error) {
        throw toProxyError(error, "session_id_failed", "Session id acquisition failed");
      }

      if (puid !== undefined) {
        this.entries.set(cacheKey, { puid, expiresAt: this.now() + this.ttlMs });
        this.logger?.debug({ event: "puid_cached", ttlMs: this.ttlMs }, "puid_cached");
      }
      return puid;
    });
  }
}

/** Reads `_puid` from the Set-Cookie of the models listing. Only Plus (gpt-4) sessions carry one. */
export class UpstreamPuidAcquirer implements PuidAcquirer {
  public constructor(
    private readonly client: HttpClient,
    private readonly origin: string,
  ) {}

  public async acquire(credential: string, model: string): Promise<string | undefined> {
    if (!model.startsWith("gpt-4")) {
      return undefined;
    }

    let response: UpstreamResponse;
    try {
      response = await this.client.send({
        method: "GET",
        url: `${this.origin}/backend-api/models`,
        headers: { authorization: `Bearer ${stripBearer(credential)}` },
      });
    } catch (error) {
      throw new ProxyError("session_id_failed", "Session id request failed", {
        message: error instanceof Error ? error.message : String(error),
      });
    }

    // Drain so the connection can be reused.
    await text(response.body);

    if (response.status < 200 || response.status >= 300) {
      throw new ProxyError("session_id_failed", `Models endpoint returned ${response.status}`, {
        upstreamStatus: response.status,
      });
    }

    return readSetCookie(response.headers, PUID_COOKIE);
  }
}
