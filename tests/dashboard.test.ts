import { describe, expect, it } from "vitest";
import { rewriteDashboardRequest, type DashboardRewriterDependencies } from "../src/proxy/dashboard.js";
import { captureLogger, FakeBroker, FakeHttpClient, makeRequest } from "./fakes.js";

function buildDeps(broker = new FakeBroker("platform-token")) {
  const client = new FakeHttpClient();
  const deps: DashboardRewriterDependencies = { broker, client, logger: captureLogger().logger };
  return { deps, broker, client };
}

function dashboardRequest(json?: unknown, body?: Buffer) {
  return makeRequest({
    pathAndQuery: "/dashboard/user/api_keys",
    headers: { authorization: "Bearer sess-key", "content-type": "application/json" },
    json,
    ...(body ? { body } : {}),
  });
}

describe("rewriteDashboardRequest", () => {
  it("ignores other routes and methods", async () => {
    const { deps, broker } = buildDeps();
    const get = makeRequest({ method: "GET", pathAndQuery: "/dashboard/user/api_keys" });
    const conversation = makeRequest({ json: { model: "gpt-4" } });
    const bodyBefore = conversation.body;

    await rewriteDashboardRequest(get, deps);
    await rewriteDashboardRequest(conversation, deps);

    expect(broker.calls).toHaveLength(0);
    expect(get.body).toBeUndefined();
    expect(conversation.body).toBe(bodyBefore);
  });

  it("adds a platform arkose token when the field is missing", async () => {
    const { deps, broker, client } = buildDeps();
    const request = dashboardRequest({ action: "create", name: "ci" });

    await rewriteDashboardRequest(request, deps);

    expect(broker.calls).toEqual([{ client, type: "platform" }]);
    expect(request.body?.toString("utf8")).toBe('{"action":"create","name":"ci","arkose_token":"platform-token"}');
    expect(request.headers["openai-sentinel-arkose-token"]).toBeUndefined();
  });

  it.each([
    ["a token", "given"],
    ["an empty string", ""],
    ["null", null],
  ])("keeps the body when arkose_token is present as %s", async (_label, value) => {
    const { deps, broker } = buildDeps();
    const request = dashboardRequest({ action: "create", arkose_token: value });
    const bodyBefore = request.body;

    await rewriteDashboardRequest(request, deps);

    expect(broker.calls).toHaveLength(0);
    expect(request.body).toBe(bodyBefore);
  });

  it("is a no-op on its own output", async () => {
    const { deps, broker } = buildDeps();
    const request = dashboardRequest({ action: "create" });

    await rewriteDashboardRequest(request, deps);
    const firstPass = Buffer.from(request.body ?? Buffer.alloc(0));
    await rewriteDashboardRequest(request, deps);

    expect(broker.calls).toHaveLength(1);
    expect(request.body?.equals(firstPass)).toBe(true);
  });

  it("applies the same body checks as the conversation route", async () => {
    const { deps } = buildDeps();

    await expect(rewriteDashboardRequest(dashboardRequest(), deps)).rejects.toMatchObject({ code: "body_required" });
    await expect(rewriteDashboardRequest(dashboardRequest("text"), deps)).rejects.toMatchObject({
      code: "body_must_be_json_object",
    });
    await expect(
      rewriteDashboardRequest(dashboardRequest(undefined, Buffer.from("{", "utf8")), deps),
    ).rejects.toMatchObject({ code: "invalid_json" });
  });

  it("propagates broker failures", async () => {
    const { deps } = buildDeps(new FakeBroker(new Error("solver timeout")));
    const request = dashboardRequest({ action: "create" });
    const bodyBefore = request.body;

    await expect(rewriteDashboardRequest(request, deps)).rejects.toMatchObject({ code: "challenge_failed" });
    expect(request.body).toBe(bodyBefore);
  });
});
