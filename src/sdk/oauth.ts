/**
 * OAuth flows for an app: authorization URLs, token exchange, and
 * verification of the session cookie and signed requests.
 *
 * Token endpoints are reached through a Dispatcher that carries no
 * access token; the app id and secret travel as request params instead.
 */

import {
  parseCookieSession,
  type CookieMap,
  type CookieSession,
} from "../protocol/cookie-session.js";
import {
  ArgumentError,
  EmptyResponseError,
  UpstreamAPIError,
} from "../protocol/errors.js";
import { parseSignedRequest } from "../protocol/signed-request.js";
import {
  DEFAULT_SIGNED_REQUEST_MAX_AGE,
  isJSONObject,
  type JSONObject,
  type JSONValue,
} from "../protocol/types.js";
import type { ClientConfig } from "./config.js";
import { Dispatcher } from "./dispatcher.js";
import { createLogger, type Logger } from "./logger.js";
import type { RequestParams, TransportBase } from "./transport/base.js";

/** Fields of a form-encoded token response (`access_token`, `expires`, ...). */
export type TokenInfo = Record<string, string>;

export interface OAuthCodeUrlOptions {
  /** Permissions to request, as a list or a comma-separated string. */
  permissions?: string | string[];
  callback?: string;
}

export interface AccessTokenUrlOptions {
  callback?: string;
}

/**
 * Parse a `key=value&key=value` token response. Values are kept as sent,
 * without URL decoding.
 */
export function parseAccessToken(responseText: string): TokenInfo {
  const components: TokenInfo = {};
  for (const bit of responseText.split("&")) {
    const [key, value] = bit.split("=");
    components[key] = value ?? "";
  }
  return components;
}

function stringField(obj: JSONObject, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

/**
 * Throw when a token endpoint body carries an error. The details come
 * from the body's `error` object when it parses, else they are empty.
 */
export function raiseIfTokenError(body: string): void {
  if (!/error/.test(body)) {
    return;
  }
  let details: JSONValue = null;
  try {
    const parsed: JSONValue = JSON.parse(body);
    details = isJSONObject(parsed) ? parsed["error"] ?? null : null;
  } catch {
    details = null;
  }
  if (isJSONObject(details)) {
    throw new UpstreamAPIError({
      type: stringField(details, "type"),
      message: stringField(details, "message"),
    });
  }
  throw new UpstreamAPIError({});
}

export class OAuth {
  readonly appId: string;
  readonly oauthCallbackUrl: string | null;
  readonly graphServer: string;
  private readonly _appSecret: string;
  private readonly _dispatcher: Dispatcher;
  private readonly _log: Logger;

  constructor(
    config: ClientConfig,
    transport: TransportBase,
    options: { logger?: Logger } = {}
  ) {
    const { appId, appSecret } = config.requireAppCredentials();
    this.appId = appId;
    this._appSecret = appSecret;
    this.oauthCallbackUrl = config.oauthCallbackUrl;
    this.graphServer = config.graphServer;
    this._log = options.logger ?? createLogger("oauth");
    this._dispatcher = new Dispatcher({ transport, logger: this._log });
  }

  // ---------------------------------------------------------------------------
  // Cookies
  // ---------------------------------------------------------------------------

  /**
   * Verified session from the JavaScript SDK cookie, or null when the user
   * is not logged in (no cookie, bad signature, or expired).
   */
  getUserInfoFromCookie(cookies: CookieMap): CookieSession | null {
    return parseCookieSession(cookies, this.appId, this._appSecret);
  }

  getUserInfoFromCookies(cookies: CookieMap): CookieSession | null {
    return this.getUserInfoFromCookie(cookies);
  }

  /** The logged-in user's id from the session cookie, or null. */
  getUserFromCookie(cookies: CookieMap): string | null {
    const info = this.getUserInfoFromCookie(cookies);
    return info?.["uid"] ?? null;
  }

  getUserFromCookies(cookies: CookieMap): string | null {
    return this.getUserFromCookie(cookies);
  }

  // ---------------------------------------------------------------------------
  // URLs
  // ---------------------------------------------------------------------------

  urlForOAuthCode(options: OAuthCodeUrlOptions = {}): string {
    const { permissions } = options;
    const scope = permissions
      ? `&scope=${Array.isArray(permissions) ? permissions.join(",") : permissions}`
      : "";

    const callback = options.callback ?? this.oauthCallbackUrl;
    if (!callback) {
      throw new ArgumentError(
        "urlForOAuthCode must get a callback either from the OAuth object or in the options!"
      );
    }

    return `https://${this.graphServer}/oauth/authorize?client_id=${this.appId}&redirect_uri=${callback}${scope}`;
  }

  urlForAccessToken(code: string, options: AccessTokenUrlOptions = {}): string {
    const callback = options.callback ?? this.oauthCallbackUrl;
    if (!callback) {
      throw new ArgumentError(
        "urlForAccessToken must get a callback either from the OAuth object or in the options!"
      );
    }
    return `https://${this.graphServer}/oauth/access_token?client_id=${this.appId}&redirect_uri=${callback}&client_secret=${this._appSecret}&code=${code}`;
  }

  // ---------------------------------------------------------------------------
  // Token exchange
  // ---------------------------------------------------------------------------

  /** Exchange an authorization code for token info. */
  async getAccessTokenInfo(code: string): Promise<TokenInfo> {
    const args: RequestParams = { code };
    if (this.oauthCallbackUrl) {
      args["redirect_uri"] = this.oauthCallbackUrl;
    }
    return this.getTokenFromServer(args);
  }

  async getAccessToken(code: string): Promise<string | null> {
    const info = await this.getAccessTokenInfo(code);
    return info["access_token"] ?? null;
  }

  /** The app's own, sessionless token info. */
  async getAppAccessTokenInfo(): Promise<TokenInfo> {
    return this.getTokenFromServer({ type: "client_cred" }, true);
  }

  async getAppAccessToken(): Promise<string | null> {
    const info = await this.getAppAccessTokenInfo();
    return info["access_token"] ?? null;
  }

  /**
   * Exchange legacy session keys for token objects, in input order. Keys
   * the service cannot exchange come back as null.
   */
  async getTokenInfoFromSessionKeys(sessions: string[]): Promise<JSONValue[]> {
    const response = await this.fetchTokenString(
      { type: "client_cred", sessions: sessions.join(",") },
      true,
      "exchange_sessions"
    );

    // An empty body is how the service reports some failures here
    if (response === "") {
      throw new EmptyResponseError(
        `getTokenInfoFromSessionKeys received an empty response body for ${sessions.length} session(s)`
      );
    }
    raiseIfTokenError(response);

    let results: JSONValue;
    try {
      results = JSON.parse(response);
    } catch {
      throw new UpstreamAPIError({
        type: "InvalidResponse",
        message: "Session exchange response is not valid JSON",
      });
    }
    if (!Array.isArray(results)) {
      throw new UpstreamAPIError({
        type: "InvalidResponse",
        message: "Session exchange response is not a list",
      });
    }
    return results;
  }

  async getTokensFromSessionKeys(sessions: string[]): Promise<(string | null)[]> {
    const results = await this.getTokenInfoFromSessionKeys(sessions);
    return results.map((r) => {
      if (!isJSONObject(r)) {
        return null;
      }
      const token = r["access_token"];
      return typeof token === "string" ? token : null;
    });
  }

  async getTokenFromSessionKey(session: string): Promise<string | null> {
    const tokens = await this.getTokensFromSessionKeys([session]);
    return tokens[0] ?? null;
  }

  // ---------------------------------------------------------------------------
  // Signed requests
  // ---------------------------------------------------------------------------

  parseSignedRequest(
    input: string,
    maxAge: number = DEFAULT_SIGNED_REQUEST_MAX_AGE
  ): JSONObject {
    return parseSignedRequest(input, this._appSecret, maxAge);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  protected async getTokenFromServer(
    args: RequestParams,
    post: boolean = false
  ): Promise<TokenInfo> {
    const result = await this.fetchTokenString(args, post);
    raiseIfTokenError(result);
    return parseAccessToken(result);
  }

  /** Raw body of `/oauth/<endpoint>`, always requested over https. */
  protected async fetchTokenString(
    args: RequestParams,
    post: boolean = false,
    endpoint: string = "access_token"
  ): Promise<string> {
    this._log.debug({ endpoint, post }, "token exchange");
    const response = await this._dispatcher.request(
      `/oauth/${endpoint}`,
      { client_id: this.appId, client_secret: this._appSecret, ...args },
      post ? "post" : "get",
      { useSsl: true }
    );
    return response.body;
  }
}
