import type { Logger } from "pino";
import { toProxyError } from "../errors.js";
import { JsonBodyDocument } from "./body.js";
import { ARKOSE_TOKEN_FIELD } from "./conversation.js";
import { type ChallengeTokenBroker, type HttpClient, type InboundRequest, requestPath } from "./types.js";

export const DASHBOARD_API_KEYS_PATH = "/dashboard/user/api_keys";

export interface DashboardRewriterDependencies {
  broker: ChallengeTokenBroker;
  client: HttpClient;
  logger: Logger;
}

export function isDashboardRequest(request: InboundRequest): boolean {
  return request.method.toUpperCase() === "POST" && requestPath(request) === DASHBOARD_API_KEYS_PATH;
}

// Any present arkose_token (even "" or null) is left alone here, unlike the
// conversation endpoint.
export async function rewriteDashboardRequest(
  request: InboundRequest,
  deps: DashboardRewriterDependencies,
): Promise<void> {
  if (!isDashboardRequest(request)) {
    return;
  }

  const document = JsonBodyDocument.parse(request.body);
  if (document.has(ARKOSE_TOKEN_FIELD)) {
    return;
  }

  let arkoseToken: string;
  try {
    arkoseToken = await deps.broker.acquire({ client: deps.client, type: "platform" });
  } catch (error) {
    throw toProxyError(error, "challenge_failed", "Arkose token acquisition failed");
  }

  document.set(ARKOSE_TOKEN_FIELD, arkoseToken);
  document.commit(request);
  deps.logger.debug({ event: "platform_arkose_token_attached", length: arkoseToken.length }, "platform_arkose_token_attached");
}
