/**
 * Credential verification and shared protocol types.
 *
 * Public API re-exports for the protocol layer.
 */

// Types
export {
  GRAPH_SERVER,
  REST_SERVER,
  DEFAULT_SIGNED_REQUEST_MAX_AGE,
  type JSONPrimitive,
  type JSONValue,
  type JSONObject,
  isJSONObject,
  base64UrlDecode,
  base64UrlEncode,
  safeEqual,
} from "./types.js";

// Errors
export {
  GraphLinkError,
  type APIErrorDetails,
  APIError,
  TransportError,
  UpstreamAPIError,
  EmptyResponseError,
  type SignatureFailure,
  SignatureError,
  ArgumentError,
} from "./errors.js";

// Cookie sessions
export {
  type CookieSession,
  type CookieMap,
  cookieName,
  cookieSignature,
  splitCookieValue,
  parseCookieSession,
} from "./cookie-session.js";

// Signed requests
export {
  SIGNED_REQUEST_ALGORITHMS,
  type SignedRequestAlgorithm,
  parseSignedRequest,
} from "./signed-request.js";
