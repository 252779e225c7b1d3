import { gzipSync } from "node:zlib";
import request from "supertest";
import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.js";
import { ProxyError } from "../src/errors.js";
import { createHttpApp, describeBodyParserError, type ProxyDispatcher } from "../src/http/server.js";
import { RequestDispatcher } from "../src/proxy/dispatcher.js";
import type { InboundRequest, ProxyResponse } from "../src/proxy/types.js";
import { captureLogger, FakeBroker, FakeHttpClient, FakeSentinel, FakeSessionCache, textResponse } from "./fakes.js";

const ORIGIN = "https://chatgpt.test";

class RecordingDispatcher implements ProxyDispatcher {
  public readonly calls: Array<{ origin: string; request: InboundRequest }> = [];

  public constructor(private readonly outcome: () => ProxyResponse | Error) {}

  public async dispatch(origin: string, inbound: InboundRequest): Promise<ProxyResponse> {
    this.calls.push({ origin, request: inbound });
    const result = this.outcome();
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }
}

function upstreamOk(body = "hello", headers: ProxyResponse["headers"] = { "content-type": "text/plain" }): ProxyResponse {
  return { ...textResponse(200, body, headers), local: false, durationMs: 1 };
}

function buildApp(dispatcher: ProxyDispatcher, env: Record<string, string> = {}) {
  const config = loadConfig({
    UPSTREAM_ORIGIN: ORIGIN,
    UPSTREAM_COOKIES: "cf_clearance=cf-test",
    ...env,
  });
  return createHttpApp({ config, logger: captureLogger().logger, dispatcher });
}

describe("HTTP contract", () => {
  it("answers health checks without dispatching", async () => {
    const dispatcher = new RecordingDispatcher(() => upstreamOk());
    const response = await request(buildApp(dispatcher)).get("/health");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ ok: true, version: "1.0.0", upstream: ORIGIN });
    expect(response.headers["x-proxy-request-id"]).toBeTruthy();
    expect(dispatcher.calls).toHaveLength(0);
  });

  it("dispatches the raw request to the upstream origin and relays the response", async () => {
    const dispatcher = new RecordingDispatcher(() =>
      upstreamOk("relayed", { "content-type": "text/plain", "x-upstream": "1", "transfer-encoding": "chunked" }),
    );

    const response = await request(buildApp(dispatcher))
      .post("/backend-api/conversation?stream=1")
      .set("authorization", "Bearer abc")
      .set("content-type", "application/json")
      .set("x-request-id", "rid-42")
      .send('{"model":"gpt-4"}');

    expect(response.status).toBe(200);
    expect(response.text).toBe("relayed");
    expect(response.headers["x-upstream"]).toBe("1");
    expect(response.headers["x-proxy-request-id"]).toBe("rid-42");

    expect(dispatcher.calls).toHaveLength(1);
    const call = dispatcher.calls[0];
    expect(call?.origin).toBe(ORIGIN);
    expect(call?.request.method).toBe("POST");
    expect(call?.request.pathAndQuery).toBe("/backend-api/conversation?stream=1");
    expect(call?.request.headers.authorization).toBe("Bearer abc");
    expect(call?.request.body?.toString("utf8")).toBe('{"model":"gpt-4"}');
    expect(call?.request.jar.cookiesFor(new URL(ORIGIN))).toEqual([{ name: "cf_clearance", value: "cf-test" }]);
  });

  it("passes bodiless requests without a body", async () => {
    const dispatcher = new RecordingDispatcher(() => upstreamOk());

    await request(buildApp(dispatcher)).get("/backend-api/models");

    expect(dispatcher.calls[0]?.request.body).toBeUndefined();
  });

  it("marks event streams as unbuffered", async () => {
    const dispatcher = new RecordingDispatcher(() =>
      upstreamOk("data: {}\n\n", { "content-type": "text/event-stream" }),
    );

    const response = await request(buildApp(dispatcher)).get("/backend-api/conversation/stream");

    expect(response.headers["x-accel-buffering"]).toBe("no");
    expect(response.headers["cache-control"]).toBe("no-cache");
  });

  it.each([
    [new ProxyError("model_required", "Request body must contain a string model field"), 400, "model_required"],
    [new ProxyError("access_token_required", "Authorization bearer token is required"), 401, "access_token_required"],
    [new ProxyError("upstream_rejected", "Sentinel endpoint returned 403"), 400, "upstream_rejected"],
    [new ProxyError("challenge_failed", "Arkose solver returned 503"), 500, "challenge_failed"],
    [new Error("unexpected"), 500, "unknown"],
  ])("renders %s as an OpenAI style error", async (error, status, code) => {
    const dispatcher = new RecordingDispatcher(() => error);

    const response = await request(buildApp(dispatcher)).post("/backend-api/conversation").send("{}");

    expect(response.status).toBe(status);
    expect(response.body).toEqual({
      error: { message: error.message, type: "proxy_error", code, param: null },
    });
    expect(response.headers["x-proxy-version"]).toBe("1.0.0");
  });

  it("rejects bodies over the configured limit", async () => {
    const dispatcher = new RecordingDispatcher(() => upstreamOk());

    const response = await request(buildApp(dispatcher, { HTTP_BODY_LIMIT: "10b" }))
      .post("/backend-api/conversation")
      .set("content-type", "application/json")
      .send('{"model":"gpt-4","messages":[]}');

    expect(response.status).toBe(413);
    expect(response.body.error.code).toBe("body_too_large");
    expect(dispatcher.calls).toHaveLength(0);
  });

  it("forwards a rewritten conversation through the real dispatcher", async () => {
    const client = new FakeHttpClient(() => textResponse(200, "upstream-ok"));
    const dispatcher = new RequestDispatcher({
      client,
      sessionCache: new FakeSessionCache("sid123"),
      sentinel: new FakeSentinel("sent456"),
      broker: new FakeBroker("chal789"),
      logger: captureLogger().logger,
    });

    const response = await request(buildApp(dispatcher))
      .post("/backend-api/conversation")
      .set("authorization", "Bearer abc")
      .set("content-type", "application/json")
      .send('{"model":"gpt-4"}');

    expect(response.status).toBe(200);
    expect(response.text).toBe("upstream-ok");
    expect(client.requests).toHaveLength(1);
    const forwarded = client.requests[0];
    expect(forwarded?.url).toBe(`${ORIGIN}/backend-api/conversation`);
    expect(forwarded?.headers.cookie).toBe("_puid=sid123; cf_clearance=cf-test");
    expect(forwarded?.headers["openai-sentinel-chat-requirements-token"]).toBe("sent456");
    expect(forwarded?.headers["openai-sentinel-arkose-token"]).toBe("chal789");
    expect(forwarded?.headers.host).toBeUndefined();
    expect(forwarded?.body?.toString("utf8")).toBe('{"model":"gpt-4","arkose_token":"chal789"}');
  });

  it("forwards compressed bodies byte for byte with their encoding", async () => {
    const client = new FakeHttpClient(() => textResponse(200, "stored"));
    const dispatcher = new RequestDispatcher({
      client,
      sessionCache: new FakeSessionCache(),
      sentinel: new FakeSentinel(),
      broker: new FakeBroker(),
      logger: captureLogger().logger,
    });
    const compressed = gzipSync('{"a":1}');

    const response = await request(buildApp(dispatcher))
      .post("/backend-api/files")
      .set("content-type", "application/json")
      .set("content-encoding", "gzip")
      .send(compressed);

    expect(response.status).toBe(200);
    const forwarded = client.requests[0];
    expect(forwarded?.headers["content-encoding"]).toBe("gzip");
    expect(forwarded?.body?.equals(compressed)).toBe(true);
  });

  it("rejects a compressed conversation body as invalid JSON", async () => {
    const client = new FakeHttpClient(() => textResponse(200, "upstream-ok"));
    const dispatcher = new RequestDispatcher({
      client,
      sessionCache: new FakeSessionCache(),
      sentinel: new FakeSentinel(),
      broker: new FakeBroker(),
      logger: captureLogger().logger,
    });

    const response = await request(buildApp(dispatcher))
      .post("/backend-api/conversation")
      .set("authorization", "Bearer abc")
      .set("content-type", "application/json")
      .set("content-encoding", "gzip")
      .send(gzipSync('{"model":"gpt-4"}'));

    expect(response.status).toBe(400);
    expect(response.body.error.code).toBe("invalid_json");
    expect(client.requests).toHaveLength(0);
  });
});

describe("describeBodyParserError", () => {
  it.each([
    [{ type: "entity.too.large", status: 413 }, { status: 413, code: "body_too_large" }],
    [{ type: "request.aborted", status: 400 }, { status: 400, code: "request_aborted" }],
    [{ type: "request.size.invalid", status: 400 }, { status: 400, code: "body_size_mismatch" }],
    [{ type: "encoding.unsupported", status: 415 }, { status: 415, code: "unsupported_encoding" }],
    [{ type: "stream.not.readable", status: 400 }, { status: 400, code: "invalid_request_body" }],
  ])("keeps the client status of %o", (error, expected) => {
    expect(describeBodyParserError(error)).toMatchObject(expected);
  });

  it("leaves other errors to the proxy error handler", () => {
    expect(describeBodyParserError(new Error("boom"))).toBeUndefined();
    expect(describeBodyParserError({ type: "stream.encoding.set", status: 500 })).toBeUndefined();
    expect(describeBodyParserError(new ProxyError("invalid_json", "bad"))).toBeUndefined();
  });
});
