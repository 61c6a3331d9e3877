/**
 * Session cookies written by the JavaScript SDK.
 *
 * The cookie is named `fbs_<appId>` and holds a quoted, `&`-separated list
 * of `key=value` pairs. Its `sig` field is the MD5 hex digest of every
 * other pair (sorted by key, concatenated without separators) followed by
 * the app secret.
 */

import { createHash } from "node:crypto";

import { epochSeconds, safeEqual } from "./types.js";

/** Fields of a verified session cookie (`uid`, `access_token`, `expires`, `sig`, ...). */
export type CookieSession = Record<string, string>;

/** Cookie name to raw cookie value, as a web framework hands it over. */
export type CookieMap = Readonly<Record<string, string | undefined>>;

export function cookieName(appId: string): string {
  return `fbs_${appId}`;
}

/** Split a raw cookie value into its fields. Quote characters are dropped. */
export function splitCookieValue(raw: string): CookieSession {
  // Collected in a Map so keys such as `__proto__` stay ordinary fields
  const components = new Map<string, string>();
  for (const param of raw.replace(/"/g, "").split("&")) {
    const [key, value] = param.split("=");
    components.set(key, value ?? "");
  }
  return Object.fromEntries(components);
}

/** Compute the `sig` value for a set of cookie fields. */
export function cookieSignature(
  components: CookieSession,
  appSecret: string
): string {
  const authString = Object.keys(components)
    .filter((key) => key !== "sig")
    .sort()
    .map((key) => `${key}=${components[key]}`)
    .join("");
  return createHash("md5").update(authString + appSecret).digest("hex");
}

/**
 * Parse and verify the session cookie for `appId`.
 *
 * Returns null when the cookie is missing, its signature does not match,
 * or it has expired. An `expires` of "0" never expires.
 */
export function parseCookieSession(
  cookies: CookieMap,
  appId: string,
  appSecret: string
): CookieSession | null {
  const raw = cookies[cookieName(appId)];
  if (raw === undefined) {
    return null;
  }

  const components = splitCookieValue(raw);
  const provided = components["sig"];
  if (provided === undefined) {
    return null;
  }

  const expected = cookieSignature(components, appSecret);
  if (!safeEqual(Buffer.from(expected, "utf-8"), Buffer.from(provided, "utf-8"))) {
    return null;
  }

  const expires = components["expires"];
  if (expires === "0") {
    return components;
  }
  const expiresAt = Number.parseInt(expires ?? "", 10);
  return epochSeconds() < expiresAt ? components : null;
}
