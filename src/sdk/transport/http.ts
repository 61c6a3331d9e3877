/**
 * HTTP transport via native fetch.
 *
 * GET requests carry their params in the query string; everything else
 * is a form-encoded POST. Verbs the service does not accept directly
 * (DELETE) are tunnelled as POST with a `method` param.
 *
 * Uses native fetch (Node.js 18+ has global fetch).
 */

import {
  TransportBase,
  type HTTPResponse,
  type HTTPVerb,
  type RequestParams,
  type TransportOptions,
} from "./base.js";

export interface HTTPTransportOptions {
  graphServer: string;
  restServer: string;
}

export class HTTPTransport extends TransportBase {
  private _graphServer: string;
  private _restServer: string;

  constructor(options: HTTPTransportOptions) {
    super();
    this._graphServer = options.graphServer.replace(/\/+$/, "");
    this._restServer = options.restServer.replace(/\/+$/, "");
  }

  /** Absolute URL for `path`, without query string. */
  urlFor(path: string, params: RequestParams, options: TransportOptions): string {
    const secure = options.useSsl === true || "access_token" in params;
    const host = options.restApi ? this._restServer : this._graphServer;
    return `${secure ? "https" : "http"}://${host}${path}`;
  }

  async request(
    path: string,
    params: RequestParams,
    verb: HTTPVerb,
    options: TransportOptions
  ): Promise<HTTPResponse> {
    let args = params;
    let method = verb;
    if (method !== "get" && method !== "post") {
      args = { ...params, method };
      method = "post";
    }

    const url = new URL(this.urlFor(path, args, options));
    const init: RequestInit = { method: method.toUpperCase() };
    if (method === "get") {
      for (const [k, v] of Object.entries(args)) {
        url.searchParams.set(k, v);
      }
    } else {
      init.headers = { "Content-Type": "application/x-www-form-urlencoded" };
      init.body = new URLSearchParams(args).toString();
    }

    const resp = await fetch(url.toString(), init);
    const headers: Record<string, string> = {};
    resp.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });
    return {
      status: resp.status,
      body: await resp.text(),
      headers,
    };
  }
}
