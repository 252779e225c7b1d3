import { describe, expect, it } from "vitest";
import { SentinelTokenFetcher, stripBearer } from "../src/proxy/sentinel.js";
import { FakeHttpClient, jsonResponse, textResponse } from "./fakes.js";

const ORIGIN = "https://chatgpt.test";

describe("SentinelTokenFetcher", () => {
  it("posts to the chat requirements endpoint with the bearer credential", async () => {
    const client = new FakeHttpClient(() => jsonResponse(200, { token: "sent456", persona: "chatgpt-paid" }));
    const fetcher = new SentinelTokenFetcher(client, ORIGIN);

    await expect(fetcher.fetchToken("Bearer abc")).resolves.toBe("sent456");

    expect(client.requests).toHaveLength(1);
    expect(client.requests[0]?.method).toBe("POST");
    expect(client.requests[0]?.url).toBe(`${ORIGIN}/backend-api/sentinel/chat-requirements`);
    expect(client.requests[0]?.headers.authorization).toBe("Bearer abc");
  });

  it.each([
    ["missing", {}],
    ["not a string", { token: 42 }],
    ["an array body", [{ token: "x" }]],
  ])("returns undefined when the token is %s", async (_label, payload) => {
    const fetcher = new SentinelTokenFetcher(new FakeHttpClient(() => jsonResponse(200, payload)), ORIGIN);

    await expect(fetcher.fetchToken("abc")).resolves.toBeUndefined();
  });

  it("treats a non-success status as an upstream rejection", async () => {
    const fetcher = new SentinelTokenFetcher(
      new FakeHttpClient(() => jsonResponse(403, { detail: "forbidden" })),
      ORIGIN,
    );

    await expect(fetcher.fetchToken("abc")).rejects.toMatchObject({
      code: "upstream_rejected",
      details: { upstreamStatus: 403 },
    });
  });

  it("treats an unparsable body as an upstream rejection", async () => {
    const fetcher = new SentinelTokenFetcher(new FakeHttpClient(() => textResponse(200, "<html>")), ORIGIN);

    await expect(fetcher.fetchToken("abc")).rejects.toMatchObject({ code: "upstream_rejected" });
  });

  it("reports transport errors as upstream_unreachable", async () => {
    const fetcher = new SentinelTokenFetcher(
      new FakeHttpClient(() => {
        throw new Error("Headers Timeout Error");
      }),
      ORIGIN,
    );

    await expect(fetcher.fetchToken("abc")).rejects.toMatchObject({
      code: "upstream_unreachable",
      details: { message: "Headers Timeout Error" },
    });
  });
});

describe("stripBearer", () => {
  it("removes a single leading Bearer prefix", () => {
    expect(stripBearer("Bearer abc")).toBe("abc");
    expect(stripBearer("abc")).toBe("abc");
  });
});
