import type { Logger } from "pino";
import { isProxyError, ProxyError } from "../errors.js";
import { rewriteConversationRequest } from "./conversation.js";
import { rewriteDashboardRequest } from "./dashboard.js";
import { convertHeaders } from "./headers.js";
import type { SentinelTokenSource } from "./sentinel.js";
import type {
  ChallengeTokenBroker,
  HeaderConverter,
  HttpClient,
  InboundRequest,
  LocalApi,
  OutboundRequest,
  ProxyResponse,
  SessionIdCache,
  UpstreamResponse,
} from "./types.js";

export interface RequestDispatcherDependencies {
  client: HttpClient;
  sessionCache: SessionIdCache;
  sentinel: SentinelTokenSource;
  broker: ChallengeTokenBroker;
  logger: Logger;
  arkoseGpt3Experiment?: boolean;
  localApi?: LocalApi;
  convertHeaders?: HeaderConverter;
  now?: () => number;
}

export class RequestDispatcher {
  private readonly deps: RequestDispatcherDependencies;
  private readonly convert: HeaderConverter;
  private readonly now: () => number;

  public constructor(deps: RequestDispatcherDependencies) {
    this.deps = deps;
    this.convert = deps.convertHeaders ?? convertHeaders;
    this.now = deps.now ?? (() => Date.now());
  }

  public async dispatch(origin: string, request: InboundRequest): Promise<ProxyResponse> {
    const startedAt = this.now();

    const localApi = this.deps.localApi;
    if (localApi?.supports(request)) {
      const local = await localApi.handle(request);
      return { ...local, local: true };
    }

    const url = `${origin}${request.pathAndQuery}`;

    await rewriteConversationRequest(request, {
      sessionCache: this.deps.sessionCache,
      sentinel: this.deps.sentinel,
      broker: this.deps.broker,
      client: this.deps.client,
      arkoseGpt3Experiment: this.deps.arkoseGpt3Experiment ?? false,
      logger: this.deps.logger,
    });

    await rewriteDashboardRequest(request, {
      broker: this.deps.broker,
      client: this.deps.client,
      logger: this.deps.logger,
    });

    const outbound: OutboundRequest = {
      method: request.method,
      url,
      headers: this.convert(request.headers, request.jar, origin),
    };
    if (request.body !== undefined) {
      outbound.body = request.body;
    }

    let upstream: UpstreamResponse;
    try {
      upstream = await this.deps.client.send(outbound);
    } catch (error) {
      if (isProxyError(error)) {
        throw error;
      }
      throw new ProxyError("upstream_unreachable", "Upstream request failed", {
        url,
        message: error instanceof Error ? error.message : String(error),
      });
    }

    const durationMs = this.now() - startedAt;
    this.deps.logger.info(
      { event: "upstream_forwarded", method: request.method, url, status: upstream.status, durationMs },
      "upstream_forwarded",
    );

    return {
      status: upstream.status,
      headers: upstream.headers,
      body: upstream.body,
      local: false,
      upstreamUrl: url,
      durationMs,
    };
  }
}
