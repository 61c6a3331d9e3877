/**
 * Tests for the fetch-backed transport. fetch is stubbed; nothing leaves
 * the process.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { HTTPTransport } from "../../src/sdk/transport/http.js";
import { createTransport } from "../../src/sdk/transport/index.js";
import { ClientConfig } from "../../src/sdk/config.js";

const mockFetch = vi.fn();

function lastCall(): { url: string; init: RequestInit } {
  const [url, init] = mockFetch.mock.calls[mockFetch.mock.calls.length - 1];
  return { url: String(url), init: init ?? {} };
}

describe("HTTPTransport", () => {
  let transport: HTTPTransport;

  beforeEach(() => {
    mockFetch.mockReset();
    mockFetch.mockResolvedValue(
      new Response('{"id":"1"}', {
        status: 200,
        headers: { "Content-Type": "application/json", "X-FB-Rev": "77" },
      })
    );
    vi.stubGlobal("fetch", mockFetch);
    transport = new HTTPTransport({
      graphServer: "graph.example.com",
      restServer: "api.example.com/",
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("sends GET params in the query string over http without a token", async () => {
    await transport.request("/me", { fields: "id,name" }, "get", {});
    const { url, init } = lastCall();
    expect(url).toBe("http://graph.example.com/me?fields=id%2Cname");
    expect(init.method).toBe("GET");
    expect(init.body).toBeUndefined();
  });

  it("switches to https when an access token is present", async () => {
    await transport.request("/me", { access_token: "test-token" }, "get", {});
    expect(lastCall().url).toBe("https://graph.example.com/me?access_token=test-token");
  });

  it("switches to https when asked to", async () => {
    await transport.request("/oauth/access_token", {}, "get", { useSsl: true });
    expect(lastCall().url).toBe("https://graph.example.com/oauth/access_token");
  });

  it("targets the REST server for REST calls", async () => {
    await transport.request("/method/fql.query", { format: "json" }, "get", { restApi: true });
    expect(lastCall().url).toBe("http://api.example.com/method/fql.query?format=json");
  });

  it("form-encodes POST bodies", async () => {
    await transport.request("/me/feed", { message: "hi there" }, "post", {});
    const { url, init } = lastCall();
    expect(url).toBe("http://graph.example.com/me/feed");
    expect(init.method).toBe("POST");
    expect(init.body).toBe("message=hi+there");
    expect(init.headers).toEqual({ "Content-Type": "application/x-www-form-urlencoded" });
  });

  it("tunnels DELETE through POST with a method param", async () => {
    await transport.request("/123", { access_token: "test-token" }, "delete", {});
    const { url, init } = lastCall();
    expect(url).toBe("https://graph.example.com/123");
    expect(init.method).toBe("POST");
    expect(init.body).toBe("access_token=test-token&method=delete");
  });

  it("returns status, body and lowercased headers", async () => {
    const response = await transport.request("/1", {}, "get", {});
    expect(response.status).toBe(200);
    expect(response.body).toBe('{"id":"1"}');
    expect(response.headers["x-fb-rev"]).toBe("77");
    expect(response.headers["content-type"]).toBe("application/json");
  });

  it("returns server errors instead of throwing", async () => {
    mockFetch.mockResolvedValueOnce(new Response("Service Unavailable", { status: 503 }));
    const response = await transport.request("/1", {}, "get", {});
    expect(response.status).toBe(503);
    expect(response.body).toBe("Service Unavailable");
  });
});

describe("createTransport", () => {
  it("uses the hosts from config", () => {
    const config = new ClientConfig({ graphServer: "graph.test", restServer: "rest.test" });
    const transport = createTransport(config);
    expect(transport.urlFor("/x", {}, {})).toBe("http://graph.test/x");
    expect(transport.urlFor("/x", {}, { restApi: true })).toBe("http://rest.test/x");
  });
});
