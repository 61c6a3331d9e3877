/**
 * graphlink -- Graph API and REST API client.
 *
 * Top-level package exports: the SDK clients, and `protocol` for
 * credential verification and shared types.
 */

export * from "./sdk/index.js";
export {
  APIError,
  ArgumentError,
  EmptyResponseError,
  GraphLinkError,
  SignatureError,
  TransportError,
  UpstreamAPIError,
  parseCookieSession,
  parseSignedRequest,
} from "./protocol/index.js";
export type { CookieSession, JSONObject, JSONValue } from "./protocol/index.js";
export * as protocol from "./protocol/index.js";
