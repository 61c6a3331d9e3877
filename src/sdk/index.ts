/**
 * graphlink SDK -- the client-facing API.
 */

export { ClientConfig, type ClientConfigOptions } from "./config.js";
export {
  Dispatcher,
  parseBody,
  type CallResult,
  type DispatcherOptions,
  type ErrorInspector,
} from "./dispatcher.js";
export { GraphAPI, checkGraphError, type GraphAPIMethods } from "./graph-api.js";
export { RestAPI, checkRestError, type RestAPIMethods } from "./rest-api.js";
export { GraphAndRestAPI } from "./client.js";
export {
  OAuth,
  parseAccessToken,
  raiseIfTokenError,
  type TokenInfo,
  type OAuthCodeUrlOptions,
  type AccessTokenUrlOptions,
} from "./oauth.js";
export {
  TransportBase,
  HTTPTransport,
  createTransport,
  type HTTPComponent,
  type HTTPResponse,
  type HTTPTransportOptions,
  type HTTPVerb,
  type RequestParams,
  type TransportOptions,
} from "./transport/index.js";
export { createLogger, resolveLogLevel, type Logger, type LogLevel } from "./logger.js";
