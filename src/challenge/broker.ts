import { text } from "node:stream/consumers";
import { z } from "zod";
import { ProxyError } from "../errors.js";
import type { ChallengeTokenBroker, ChallengeTokenRequest, UpstreamResponse } from "../proxy/types.js";

const solverResponseSchema = z.object({ token: z.string().min(1) }).passthrough();

/**
 * Asks an external arkose solver for a token. The request's `client` is the
 * shared outbound client; no retries are made here.
 */
export class HttpChallengeTokenBroker implements ChallengeTokenBroker {
  public constructor(private readonly solverUrl: string) {}

  public async acquire(request: ChallengeTokenRequest): Promise<string> {
    if (!this.solverUrl) {
      throw new ProxyError("challenge_failed", "No arkose solver is configured", { type: request.type });
    }

    const payload: Record<string, string> = { type: request.type };
    if (request.identifier !== undefined) {
      payload.identifier = request.identifier;
    }

    let response: UpstreamResponse;
    let raw: string;
    try {
      response = await request.client.send({
        method: "POST",
        url: this.solverUrl,
        headers: { "content-type": "application/json", accept: "application/json" },
        body: Buffer.from(JSON.stringify(payload), "utf8"),
      });
      raw = await text(response.body);
    } catch (error) {
      throw new ProxyError("challenge_failed", "Arkose solver request failed", {
        type: request.type,
        message: error instanceof Error ? error.message : String(error),
      });
    }

    if (response.status < 200 || response.status >= 300) {
      throw new ProxyError("challenge_failed", `Arkose solver returned ${response.status}`, {
        type: request.type,
        upstreamStatus: response.status,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new ProxyError("challenge_failed", "Arkose solver response is not valid JSON", { type: request.type });
    }

    const result = solverResponseSchema.safeParse(parsed);
    if (!result.success) {
      throw new ProxyError("challenge_failed", "Arkose solver response has no token", { type: request.type });
    }
    return result.data.token;
  }
}
