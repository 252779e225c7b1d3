import { type Dispatcher, request } from "undici";
import { ProxyError } from "../errors.js";
import type { HttpClient, OutboundRequest, UpstreamResponse } from "../proxy/types.js";

const HTTP_METHODS = ["GET", "HEAD", "POST", "PUT", "DELETE", "CONNECT", "OPTIONS", "TRACE", "PATCH"] as const;

type HttpMethod = (typeof HTTP_METHODS)[number];

function toHttpMethod(method: string): HttpMethod {
  const upper = method.toUpperCase();
  const match = HTTP_METHODS.find((candidate) => candidate === upper);
  if (!match) {
    throw new ProxyError("unknown", `Unsupported HTTP method: ${method}`, { method });
  }
  return match;
}

export interface UndiciHttpClientOptions {
  headersTimeoutMs: number;
  bodyTimeoutMs: number;
  dispatcher?: Dispatcher;
}

/**
 * Shared outbound client. Timeouts are enforced here; transport and timeout
 * errors are thrown as-is for callers to classify.
 */
export class UndiciHttpClient implements HttpClient {
  private readonly headersTimeoutMs: number;
  private readonly bodyTimeoutMs: number;
  private readonly dispatcher?: Dispatcher;

  public constructor(options: UndiciHttpClientOptions) {
    this.headersTimeoutMs = options.headersTimeoutMs;
    this.bodyTimeoutMs = options.bodyTimeoutMs;
    this.dispatcher = options.dispatcher;
  }

  public async send(outbound: OutboundRequest): Promise<UpstreamResponse> {
    const response = await request(outbound.url, {
      method: toHttpMethod(outbound.method),
      headers: outbound.headers,
      body: outbound.body,
      dispatcher: this.dispatcher,
      headersTimeout: this.headersTimeoutMs,
      bodyTimeout: this.bodyTimeoutMs,
    });

    return {
      status: response.statusCode,
      headers: response.headers,
      body: response.body,
    };
  }
}
