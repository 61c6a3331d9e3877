/**
 * Abstract transport interface for API communication.
 *
 * The caller picks an implementation and hands it to the clients; there
 * is no process-wide default. HTTPTransport (native fetch) ships with
 * the package; tests supply in-process fakes.
 */

export type HTTPVerb = "get" | "post" | "delete";

/** Parts of a raw response a caller may ask for instead of parsed JSON. */
export type HTTPComponent = "status" | "headers" | "body";

export interface HTTPResponse {
  status: number;
  body: string;
  /** Header names are lowercased. */
  headers: Record<string, string>;
}

export interface TransportOptions {
  /** Force https even without an access token. */
  useSsl?: boolean;
  /** Send the request to the legacy REST server instead of the Graph server. */
  restApi?: boolean;
  /** Return this part of the raw response instead of the parsed body. */
  httpComponent?: HTTPComponent;
}

export type RequestParams = Record<string, string>;

export abstract class TransportBase {
  /** Perform a single request and resolve with the raw response. */
  abstract request(
    path: string,
    params: RequestParams,
    verb: HTTPVerb,
    options: TransportOptions
  ): Promise<HTTPResponse>;
}
