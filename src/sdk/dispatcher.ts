/**
 * Request dispatch shared by every API client.
 *
 * Attaches the access token, sends the request through the injected
 * transport and turns the response into parsed JSON or a typed error.
 * One request per call: no retries, no caching.
 */

import { APIError, TransportError } from "../protocol/errors.js";
import type { JSONValue } from "../protocol/types.js";
import { createLogger, type Logger } from "./logger.js";
import type {
  HTTPComponent,
  HTTPResponse,
  HTTPVerb,
  RequestParams,
  TransportBase,
  TransportOptions,
} from "./transport/base.js";

/**
 * Endpoint-specific check run on the parsed body before it is returned.
 * Throw to reject a body that is valid JSON but describes an error.
 */
export type ErrorInspector = (body: JSONValue) => void;

export type CallResult = JSONValue | HTTPResponse[HTTPComponent];

export interface DispatcherOptions {
  transport: TransportBase;
  /** User access token. */
  accessToken?: string | null;
  /** App access token, used only when no user token is set. */
  appAccessToken?: string | null;
  logger?: Logger;
}

export class Dispatcher {
  readonly transport: TransportBase;
  private readonly _accessToken: string | null;
  private readonly _appAccessToken: string | null;
  private readonly _log: Logger;

  constructor(options: DispatcherOptions) {
    this.transport = options.transport;
    this._accessToken = options.accessToken ?? null;
    this._appAccessToken = options.appAccessToken ?? null;
    this._log = options.logger ?? createLogger("dispatcher");
  }

  get accessToken(): string | null {
    return this._accessToken;
  }

  /** The token attached to requests: the user token, else the app token. */
  get effectiveToken(): string | null {
    return this._accessToken ?? this._appAccessToken;
  }

  /**
   * Send one request without authentication or body parsing.
   */
  async request(
    path: string,
    params: RequestParams = {},
    verb: HTTPVerb = "get",
    options: TransportOptions = {}
  ): Promise<HTTPResponse> {
    const normalized = path.startsWith("/") ? path : `/${path}`;
    const response = await this.transport.request(normalized, params, verb, options);
    this._log.debug(
      { path: normalized, verb, status: response.status },
      "request completed"
    );
    return response;
  }

  /**
   * Call an API path and return the parsed JSON body.
   *
   * With `options.httpComponent` set, that part of the raw response is
   * returned instead (after the same error checks).
   *
   * @throws TransportError when the status is 500 or above.
   * @throws APIError when the body is not JSON, or whatever `inspect` throws.
   */
  call(
    path: string,
    params?: RequestParams,
    verb?: HTTPVerb,
    options?: TransportOptions & { httpComponent?: undefined },
    inspect?: ErrorInspector
  ): Promise<JSONValue>;
  call<C extends HTTPComponent>(
    path: string,
    params: RequestParams,
    verb: HTTPVerb,
    options: TransportOptions & { httpComponent: C },
    inspect?: ErrorInspector
  ): Promise<HTTPResponse[C]>;
  call(
    path: string,
    params: RequestParams,
    verb: HTTPVerb,
    options: TransportOptions,
    inspect?: ErrorInspector
  ): Promise<CallResult>;
  async call(
    path: string,
    params: RequestParams = {},
    verb: HTTPVerb = "get",
    options: TransportOptions = {},
    inspect?: ErrorInspector
  ): Promise<CallResult> {
    const args = { ...params };
    const token = this.effectiveToken;
    if (token) {
      args["access_token"] = token;
    }

    const response = await this.request(path, args, verb, options);

    // Server errors are not guaranteed to carry JSON
    if (response.status >= 500) {
      this._log.warn({ status: response.status }, "server error");
      throw new TransportError(response.status, response.body);
    }

    const body = parseBody(response.body);
    if (inspect) {
      inspect(body);
    }

    if (options.httpComponent) {
      return response[options.httpComponent];
    }
    return body;
  }
}

/**
 * Parse a response body as a single JSON value.
 *
 * The service answers some calls with bare `true`/`false`; those are
 * valid roots for JSON.parse. An empty body reads as null.
 */
export function parseBody(raw: string): JSONValue {
  const text = raw.trim();
  if (text === "") {
    return null;
  }
  try {
    const parsed: JSONValue = JSON.parse(text);
    return parsed;
  } catch {
    throw new APIError({
      type: "InvalidResponse",
      message: "Response body is not valid JSON",
    });
  }
}
