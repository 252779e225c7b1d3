import { text } from "node:stream/consumers";
import { z } from "zod";
import { ProxyError } from "../errors.js";
import type { HttpClient, UpstreamResponse } from "./types.js";

const SENTINEL_PATH = "/backend-api/sentinel/chat-requirements";

const chatRequirementsSchema = z.object({ token: z.string() }).passthrough();

export interface SentinelTokenSource {
  fetchToken(credential: string): Promise<string | undefined>;
}

export function stripBearer(credential: string): string {
  return credential.replace(/^Bearer /, "");
}

export class SentinelTokenFetcher implements SentinelTokenSource {
  public constructor(
    private readonly client: HttpClient,
    private readonly origin: string,
  ) {}

  /** Resolves to undefined when the upstream answered without a token. */
  public async fetchToken(credential: string): Promise<string | undefined> {
    let response: UpstreamResponse;
    try {
      response = await this.client.send({
        method: "POST",
        url: `${this.origin}${SENTINEL_PATH}`,
        headers: {
          authorization: `Bearer ${stripBearer(credential)}`,
          "content-type": "application/json",
        },
        body: Buffer.from("{}", "utf8"),
      });
    } catch (error) {
      throw new ProxyError("upstream_unreachable", "Sentinel endpoint request failed", {
        message: error instanceof Error ? error.message : String(error),
      });
    }

    let raw: string;
    try {
      raw = await text(response.body);
    } catch (error) {
      throw new ProxyError("upstream_unreachable", "Sentinel response body could not be read", {
        message: error instanceof Error ? error.message : String(error),
      });
    }

    if (response.status < 200 || response.status >= 300) {
      throw new ProxyError("upstream_rejected", `Sentinel endpoint returned ${response.status}`, {
        upstreamStatus: response.status,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new ProxyError("upstream_rejected", "Sentinel response is not valid JSON", {
        upstreamStatus: response.status,
      });
    }

    const result = chatRequirementsSchema.safeParse(parsed);
    return result.success ? result.data.token : undefined;
  }
}
