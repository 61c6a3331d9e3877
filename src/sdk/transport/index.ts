/**
 * graphlink transport layer.
 */

import type { ClientConfig } from "../config.js";
import { HTTPTransport } from "./http.js";

export {
  TransportBase,
  type HTTPComponent,
  type HTTPResponse,
  type HTTPVerb,
  type RequestParams,
  type TransportOptions,
} from "./base.js";
export { HTTPTransport, type HTTPTransportOptions } from "./http.js";

/**
 * Build the fetch-backed transport for the hosts in `config`.
 */
export function createTransport(config: ClientConfig): HTTPTransport {
  return new HTTPTransport({
    graphServer: config.graphServer,
    restServer: config.restServer,
  });
}
