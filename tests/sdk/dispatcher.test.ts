/**
 * Tests for the request dispatcher.
 */

import { describe, it, expect, vi } from "vitest";
import pino from "pino";

import { Dispatcher, parseBody } from "../../src/sdk/dispatcher.js";
import {
  APIError,
  TransportError,
  UpstreamAPIError,
} from "../../src/protocol/errors.js";
import { FakeTransport } from "../helpers/fake-transport.js";

const silent = pino({ level: "silent" });

function dispatcher(
  transport: FakeTransport,
  tokens: { accessToken?: string; appAccessToken?: string } = {}
): Dispatcher {
  return new Dispatcher({ transport, logger: silent, ...tokens });
}

describe("Dispatcher.call", () => {
  it("adds a leading slash to the path", async () => {
    const transport = new FakeTransport().respond("{}");
    await dispatcher(transport).call("me");
    expect(transport.lastRequest?.path).toBe("/me");
  });

  it("leaves an absolute path alone", async () => {
    const transport = new FakeTransport().respond("{}");
    await dispatcher(transport).call("/me/friends");
    expect(transport.lastRequest?.path).toBe("/me/friends");
  });

  it("defaults to a GET with no params", async () => {
    const transport = new FakeTransport().respond("{}");
    await dispatcher(transport).call("me");
    expect(transport.lastRequest).toEqual({
      path: "/me",
      params: {},
      verb: "get",
      options: {},
    });
  });

  it("attaches the user access token", async () => {
    const transport = new FakeTransport().respond("{}");
    await dispatcher(transport, { accessToken: "user-token" }).call("me", { fields: "id" });
    expect(transport.lastRequest?.params).toEqual({ fields: "id", access_token: "user-token" });
  });

  it("prefers the user token over the app token", async () => {
    const transport = new FakeTransport().respond("{}");
    await dispatcher(transport, { accessToken: "user-token", appAccessToken: "app-token" }).call("me");
    expect(transport.lastRequest?.params["access_token"]).toBe("user-token");
  });

  it("falls back to the app token", async () => {
    const transport = new FakeTransport().respond("{}");
    await dispatcher(transport, { appAccessToken: "app-token" }).call("me");
    expect(transport.lastRequest?.params["access_token"]).toBe("app-token");
  });

  it("does not modify the caller's params", async () => {
    const transport = new FakeTransport().respond("{}");
    const params = { fields: "id" };
    await dispatcher(transport, { accessToken: "user-token" }).call("me", params);
    expect(params).toEqual({ fields: "id" });
  });

  it("passes verb and options through to the transport", async () => {
    const transport = new FakeTransport().respond("true");
    await dispatcher(transport).call("123", {}, "delete", { useSsl: true });
    expect(transport.lastRequest?.verb).toBe("delete");
    expect(transport.lastRequest?.options).toEqual({ useSsl: true });
  });

  it("returns the parsed JSON body", async () => {
    const transport = new FakeTransport().respond('{"id":"5","name":"Test User"}');
    await expect(dispatcher(transport).call("5")).resolves.toEqual({ id: "5", name: "Test User" });
  });

  it("accepts bare true and false bodies", async () => {
    const transport = new FakeTransport().respond("true").respond("false");
    const d = dispatcher(transport);
    await expect(d.call("a")).resolves.toBe(true);
    await expect(d.call("b")).resolves.toBe(false);
  });

  it("throws a TransportError for status 500 and above without parsing", async () => {
    const transport = new FakeTransport().respond("<html>oops</html>", 503);
    const inspect = vi.fn();
    const err = await dispatcher(transport)
      .call("me", {}, "get", {}, inspect)
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ type: "HTTP 503", status: 503, body: "<html>oops</html>" });
    expect(inspect).not.toHaveBeenCalled();
  });

  it("parses 4xx bodies normally", async () => {
    const transport = new FakeTransport().respond('{"error":{"type":"OAuthException"}}', 400);
    await expect(dispatcher(transport).call("me")).resolves.toEqual({
      error: { type: "OAuthException" },
    });
  });

  it("throws an APIError for a body that is not JSON", async () => {
    const transport = new FakeTransport().respond("not json");
    const err = await dispatcher(transport).call("me").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(APIError);
    expect(err).toMatchObject({ type: "InvalidResponse" });
  });

  it("runs the error inspector on the parsed body", async () => {
    const transport = new FakeTransport().respond('{"error_code":190}');
    const inspect = vi.fn(() => {
      throw new UpstreamAPIError({ type: "190", message: "expired" });
    });
    await expect(dispatcher(transport).call("me", {}, "get", {}, inspect)).rejects.toThrow(
      "190: expired"
    );
    expect(inspect).toHaveBeenCalledWith({ error_code: 190 });
  });

  it("returns the requested HTTP component", async () => {
    const transport = new FakeTransport().respond('{"id":"1"}', 200, { "x-test": "yes" });
    const d = dispatcher(transport);
    await expect(d.call("1", {}, "get", { httpComponent: "status" })).resolves.toBe(200);
    await expect(d.call("1", {}, "get", { httpComponent: "headers" })).resolves.toEqual({
      "x-test": "yes",
    });
    await expect(d.call("1", {}, "get", { httpComponent: "body" })).resolves.toBe('{"id":"1"}');
  });
});

describe("Dispatcher.request", () => {
  it("normalizes the path but attaches no token", async () => {
    const transport = new FakeTransport().respond("access_token=abc");
    const response = await dispatcher(transport, { accessToken: "user-token" }).request(
      "oauth/access_token",
      { code: "c" }
    );
    expect(response.body).toBe("access_token=abc");
    expect(transport.lastRequest).toEqual({
      path: "/oauth/access_token",
      params: { code: "c" },
      verb: "get",
      options: {},
    });
  });
});

describe("parseBody", () => {
  it("parses scalar roots", () => {
    expect(parseBody("42")).toBe(42);
    expect(parseBody('"text"')).toBe("text");
    expect(parseBody("null")).toBeNull();
  });

  it("reads an empty body as null", () => {
    expect(parseBody("")).toBeNull();
    expect(parseBody("  \n")).toBeNull();
  });
});
