import type { Readable } from "node:stream";

/** Lowercased header name to value. */
export type HeaderRecord = Record<string, string>;

export interface Cookie {
  name: string;
  value: string;
}

/**
 * Cookies the proxy holds for upstream origins. Owned by the caller of
 * `dispatch`; the pipeline only reads from it.
 */
export interface CookieJar {
  cookiesFor(url: URL): Cookie[];
}

export interface InboundRequest {
  method: string;
  /** Path plus query string, e.g. `/backend-api/conversation?x=1`. */
  pathAndQuery: string;
  headers: HeaderRecord;
  body?: Buffer;
  jar: CookieJar;
}

export interface OutboundRequest {
  method: string;
  url: string;
  headers: HeaderRecord;
  body?: Buffer;
}

export interface UpstreamResponse {
  status: number;
  headers: Record<string, string | string[] | undefined>;
  body: Readable;
}

export interface HttpClient {
  send(request: OutboundRequest): Promise<UpstreamResponse>;
}

export interface ProxyResponse {
  status: number;
  headers: Record<string, string | string[] | undefined>;
  body: Readable;
  local: boolean;
  upstreamUrl?: string;
  durationMs: number;
}

/** Requests served inside the proxy instead of being forwarded. */
export interface LocalApi {
  supports(request: InboundRequest): boolean;
  handle(request: InboundRequest): Promise<ProxyResponse>;
}

export type HeaderConverter = (headers: HeaderRecord, jar: CookieJar, origin: string) => HeaderRecord;

export interface SessionIdCache {
  getOrInit(credential: string, model: string, cacheKey: string): Promise<string | undefined>;
}

export type ChallengeType = "gpt3" | "gpt4" | "platform" | "auth";

export interface ChallengeTokenRequest {
  client: HttpClient;
  type: ChallengeType;
  identifier?: string;
}

export interface ChallengeTokenBroker {
  acquire(request: ChallengeTokenRequest): Promise<string>;
}

export function requestPath(request: Pick<InboundRequest, "pathAndQuery">): string {
  const queryStart = request.pathAndQuery.indexOf("?");
  return queryStart === -1 ? request.pathAndQuery : request.pathAndQuery.slice(0, queryStart);
}
