import { describe, it, expect, vi } from "vitest";
import { classifyGraphError, GraphClient } from "../graph-client.js";
import { GatewayError, RemoteCallError } from "../errors.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const API_URL = "https://graph.example.test/v22.0";

function makeClient(respond: (url: string, init?: RequestInit) => Promise<Response>, timeoutMs = 1000) {
  const fetchMock = vi.fn((input: string | URL | Request, init?: RequestInit) => respond(String(input), init));
  return { client: new GraphClient({ apiUrl: API_URL, timeoutMs, fetch: fetchMock }), fetchMock };
}

function json(body: unknown, status = 200, headers: Record<string, string> = {}) {
  return async () => new Response(JSON.stringify(body), { status, headers });
}

function graphError(code: number, extra: Record<string, unknown> = {}) {
  return { error: { message: `error ${code}`, type: "OAuthException", code, fbtrace_id: "trace-1", ...extra } };
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

describe("classifyGraphError", () => {
  it.each([
    [400, 190, "auth"],
    [400, 102, "auth"],
    [400, 4, "rate_limited"],
    [400, 17, "rate_limited"],
    [400, 80004, "rate_limited"],
    [500, 1, "transient"],
    [400, 2, "transient"],
    [400, 100, "permanent"],
    [403, 200, "permanent"],
    [404, 803, "permanent"],
  ] as const)("HTTP %i with code %i is %s", (status, code, kind) => {
    expect(classifyGraphError(status, graphError(code)).kind).toBe(kind);
  });

  it("uses the HTTP status when the body carries no Graph error", () => {
    expect(classifyGraphError(502, null).kind).toBe("transient");
    expect(classifyGraphError(429, null).kind).toBe("rate_limited");
    expect(classifyGraphError(401, null).kind).toBe("auth");
    expect(classifyGraphError(400, null).kind).toBe("permanent");
  });

  it("treats errors flagged transient as transient", () => {
    expect(classifyGraphError(400, graphError(100, { is_transient: true })).kind).toBe("transient");
  });

  it("keeps code, subcode, trace id and Retry-After", () => {
    const error = classifyGraphError(400, graphError(17, { error_subcode: 2446079 }), "30");
    expect(error.describe()).toEqual({ status: 400, code: 17, subcode: 2446079, fbtrace_id: "trace-1" });
    expect(error.retryAfterMs).toBe(30_000);
    expect(error.message).toBe("error 17");
  });
});

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

describe("GraphClient.get", () => {
  it("sends a bearer token and returns the parsed body", async () => {
    const { client, fetchMock } = makeClient(json({ id: "act_1" }));
    await expect(
      client.get({ path: "act_1/campaigns", params: { fields: "id,name", limit: "100" }, token: "test-token" }),
    ).resolves.toEqual({ id: "act_1" });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(`${API_URL}/act_1/campaigns?fields=id%2Cname&limit=100`);
    expect(init?.headers).toEqual({ Authorization: "Bearer test-token" });
  });

  it("requests an absolute paging URL as given", async () => {
    const next = `${API_URL}/act_1/campaigns?after=abc`;
    const { client, fetchMock } = makeClient(json({ data: [] }));
    await client.get({ url: next, token: "test-token" });
    expect(fetchMock.mock.calls[0][0]).toBe(next);
  });

  it("throws a classified RemoteCallError for Graph errors", async () => {
    const { client } = makeClient(json(graphError(190), 400));
    const error = await client.get({ path: "me", params: {}, token: "test-token" }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RemoteCallError);
    expect(error).toMatchObject({ kind: "auth", status: 400, code: 190 });
  });

  it("classifies an error body even when the status is 200", async () => {
    const { client } = makeClient(json(graphError(2)));
    await expect(client.get({ path: "me", params: {}, token: "test-token" })).rejects.toMatchObject({
      kind: "transient",
    });
  });

  it("reports a non-JSON success body as MalformedResponse", async () => {
    const { client } = makeClient(async () => new Response("<html>oops</html>", { status: 200 }));
    const error = await client.get({ path: "me", params: {}, token: "test-token" }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(GatewayError);
    expect(error).toMatchObject({ kind: "MalformedResponse" });
  });

  it("classifies a non-JSON error body by status", async () => {
    const { client } = makeClient(async () => new Response("Bad Gateway", { status: 502 }));
    await expect(client.get({ path: "me", params: {}, token: "test-token" })).rejects.toMatchObject({
      kind: "transient",
      status: 502,
    });
  });

  it("reports network failures as transient", async () => {
    const { client } = makeClient(async () => {
      throw new TypeError("fetch failed");
    });
    await expect(client.get({ path: "me", params: {}, token: "test-token" })).rejects.toMatchObject({
      kind: "transient",
      status: 0,
      message: "Network error: fetch failed",
    });
  });

  it("reports a timeout as transient", async () => {
    const { client } = makeClient(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
      5,
    );
    await expect(client.get({ path: "me", params: {}, token: "test-token" })).rejects.toMatchObject({
      kind: "transient",
      message: "Request timed out after 5ms",
    });
  });

  it("reports Cancelled when the caller abandons the request", async () => {
    const controller = new AbortController();
    const { client } = makeClient(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
          controller.abort();
        }),
    );
    await expect(
      client.get({ path: "me", params: {}, token: "test-token", signal: controller.signal }),
    ).rejects.toMatchObject({ kind: "Cancelled" });
  });
});

describe("GraphClient.post", () => {
  it("sends form fields in the body and keeps them out of the URL", async () => {
    const { client, fetchMock } = makeClient(json({ id: "6001" }));
    await expect(
      client.post({ path: "act_1/campaigns", params: { name: "Spring Sale", status: "PAUSED" }, token: "test-token" }),
    ).resolves.toEqual({ id: "6001" });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(`${API_URL}/act_1/campaigns`);
    expect(init?.method).toBe("POST");
    expect(String(init?.body)).toBe("name=Spring+Sale&status=PAUSED");
    expect(init?.headers).toEqual({ Authorization: "Bearer test-token" });
  });

  it("classifies Graph errors the same way as reads", async () => {
    const { client } = makeClient(json(graphError(100), 400));
    await expect(client.post({ path: "6001", params: { status: "PAUSED" }, token: "test-token" })).rejects.toMatchObject({
      kind: "permanent",
      code: 100,
    });
  });
});
