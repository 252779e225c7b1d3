import type { Logger } from "pino";
import { ProxyError, toProxyError } from "../errors.js";
import { reduceKey } from "../session/puid.js";
import { JsonBodyDocument } from "./body.js";
import {
  bearerToken,
  hasSessionCookie,
  PUID_COOKIE,
  SENTINEL_ARKOSE_HEADER,
  SENTINEL_CHAT_REQUIREMENTS_HEADER,
  setHeader,
} from "./headers.js";
import { challengeTypeFor, isGpt3, isGpt4, parseChatModel } from "./model.js";
import type { SentinelTokenSource } from "./sentinel.js";
import {
  type ChallengeTokenBroker,
  type HttpClient,
  type InboundRequest,
  requestPath,
  type SessionIdCache,
} from "./types.js";

export const CONVERSATION_PATH = "/backend-api/conversation";
export const ARKOSE_TOKEN_FIELD = "arkose_token";

export interface ConversationRewriterDependencies {
  sessionCache: SessionIdCache;
  sentinel: SentinelTokenSource;
  broker: ChallengeTokenBroker;
  client: HttpClient;
  arkoseGpt3Experiment: boolean;
  logger: Logger;
}

export function isConversationRequest(request: InboundRequest): boolean {
  return request.method.toUpperCase() === "POST" && requestPath(request) === CONVERSATION_PATH;
}

/** A usable token is a non-empty string other than the literal "null". */
function existingArkoseToken(value: unknown): string | undefined {
  const token = typeof value === "string" ? value : "";
  return token.length === 0 || token === "null" ? undefined : token;
}

export async function rewriteConversationRequest(
  request: InboundRequest,
  deps: ConversationRewriterDependencies,
): Promise<void> {
  if (!isConversationRequest(request)) {
    return;
  }

  const document = JsonBodyDocument.parse(request.body);

  const modelId = document.get("model");
  if (typeof modelId !== "string") {
    throw new ProxyError("model_required", "Request body must contain a string model field");
  }

  const credential = bearerToken(request.headers);
  if (!credential) {
    throw new ProxyError("access_token_required", "Authorization bearer token is required");
  }

  deps.logger.debug({ event: "conversation_rewrite_start", model: modelId }, "conversation_rewrite_start");

  if (!hasSessionCookie(request.headers)) {
    const puid = await deps.sessionCache.getOrInit(credential, modelId, reduceKey(credential));
    if (puid !== undefined) {
      setHeader(request.headers, "cookie", `${PUID_COOKIE}=${puid};`);
    }
  }

  const sentinelToken = await deps.sentinel.fetchToken(credential);
  if (sentinelToken !== undefined) {
    setHeader(request.headers, SENTINEL_CHAT_REQUIREMENTS_HEADER, sentinelToken);
    deps.logger.debug(
      { event: "sentinel_token_attached", length: sentinelToken.length },
      "sentinel_token_attached",
    );
  } else {
    deps.logger.warn({ event: "sentinel_token_missing" }, "sentinel_token_missing");
  }

  const model = parseChatModel(modelId);
  if (!((deps.arkoseGpt3Experiment && isGpt3(model)) || isGpt4(model))) {
    return;
  }

  const existing = existingArkoseToken(document.get(ARKOSE_TOKEN_FIELD));
  if (existing !== undefined) {
    setHeader(request.headers, SENTINEL_ARKOSE_HEADER, existing);
    deps.logger.debug({ event: "arkose_token_reused", length: existing.length }, "arkose_token_reused");
    return;
  }

  let arkoseToken: string;
  try {
    arkoseToken = await deps.broker.acquire({
      client: deps.client,
      type: challengeTypeFor(model),
      identifier: credential,
    });
  } catch (error) {
    throw toProxyError(error, "challenge_failed", "Arkose token acquisition failed");
  }

  document.set(ARKOSE_TOKEN_FIELD, arkoseToken);
  setHeader(request.headers, SENTINEL_ARKOSE_HEADER, arkoseToken);
  document.commit(request);
  deps.logger.debug(
    { event: "arkose_token_attached", type: challengeTypeFor(model), length: arkoseToken.length },
    "arkose_token_attached",
  );
}
