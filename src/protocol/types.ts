/**
 * Core types, constants, and utility functions shared by the verifier
 * and the API clients.
 */

import { timingSafeEqual } from "node:crypto";

/** Default Graph API host. */
export const GRAPH_SERVER = "graph.facebook.com";

/** Default legacy REST API host. */
export const REST_SERVER = "api.facebook.com";

/** Default maximum age, in seconds, of an encrypted signed request. */
export const DEFAULT_SIGNED_REQUEST_MAX_AGE = 3600;

export type JSONPrimitive = string | number | boolean | null;
export type JSONValue = JSONPrimitive | JSONObject | JSONValue[];
export interface JSONObject {
  [key: string]: JSONValue;
}

export function isJSONObject(value: unknown): value is JSONObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * URL-safe base64 decode.
 *
 * Translates `-`/`_` back to `+`/`/` and pads with `=` to a multiple of
 * four before decoding.
 */
export function base64UrlDecode(s: string): Buffer {
  let b64 = s.replace(/-/g, "+").replace(/_/g, "/");
  const rem = b64.length % 4;
  if (rem !== 0) {
    b64 += "=".repeat(4 - rem);
  }
  return Buffer.from(b64, "base64");
}

/** URL-safe base64 encode, without padding. */
export function base64UrlEncode(data: Uint8Array): string {
  return Buffer.from(data).toString("base64url");
}

/** Current time in whole epoch seconds. */
export function epochSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Constant-time comparison of two byte strings.
 *
 * `timingSafeEqual()` requires equal-length buffers, so a length mismatch
 * returns false up front.
 */
export function safeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return timingSafeEqual(a, b);
}
