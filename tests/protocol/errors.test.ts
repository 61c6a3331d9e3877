/**
 * Tests for the error hierarchy.
 */

import { describe, it, expect } from "vitest";

import {
  APIError,
  ArgumentError,
  EmptyResponseError,
  GraphLinkError,
  SignatureError,
  TransportError,
  UpstreamAPIError,
} from "../../src/protocol/errors.js";

describe("errors", () => {
  it("formats API errors as type: message", () => {
    const err = new APIError({ type: "OAuthException", message: "Bad token" });
    expect(err.message).toBe("OAuthException: Bad token");
    expect(err.type).toBe("OAuthException");
    expect(err.detail).toBe("Bad token");
  });

  it("builds an empty-details error", () => {
    const err = new UpstreamAPIError({});
    expect(err.type).toBe("");
    expect(err.message).toBe(": ");
  });

  it("puts status and raw body on transport errors", () => {
    const err = new TransportError(502, "<html>Bad Gateway</html>");
    expect(err.type).toBe("HTTP 502");
    expect(err.message).toBe("HTTP 502: Response body: <html>Bad Gateway</html>");
    expect(err.status).toBe(502);
    expect(err.body).toBe("<html>Bad Gateway</html>");
  });

  it("keeps the hierarchy intact for instanceof", () => {
    expect(new TransportError(500, "")).toBeInstanceOf(APIError);
    expect(new UpstreamAPIError()).toBeInstanceOf(APIError);
    expect(new EmptyResponseError("empty")).toBeInstanceOf(APIError);
    expect(new SignatureError("too_old", "old")).toBeInstanceOf(GraphLinkError);
    expect(new ArgumentError("missing")).toBeInstanceOf(GraphLinkError);
    expect(new SignatureError("too_old", "old")).not.toBeInstanceOf(APIError);
  });

  it("names each error class", () => {
    expect(new TransportError(500, "").name).toBe("TransportError");
    expect(new EmptyResponseError("x").name).toBe("EmptyResponseError");
    expect(new SignatureError("malformed", "x").name).toBe("SignatureError");
  });
});
