/**
 * Legacy REST API methods.
 *
 * The REST server reports failures inside a 200 response as
 * `{"error_code": ..., "error_msg": ...}`.
 */

import { UpstreamAPIError } from "../protocol/errors.js";
import { isJSONObject, type JSONValue } from "../protocol/types.js";
import type { Dispatcher, ErrorInspector } from "./dispatcher.js";
import type { RequestParams } from "./transport/base.js";

export interface RestAPIMethods {
  restCall(method: string, args?: RequestParams): Promise<JSONValue>;
  fqlQuery(fql: string): Promise<JSONValue>;
}

export const checkRestError: ErrorInspector = (body) => {
  if (!isJSONObject(body) || !("error_code" in body)) {
    return;
  }
  const code = body["error_code"];
  const message = body["error_msg"];
  throw new UpstreamAPIError({
    type: code === null ? undefined : String(code),
    message: typeof message === "string" ? message : undefined,
  });
};

export class RestAPI implements RestAPIMethods {
  constructor(private readonly dispatcher: Dispatcher) {}

  async restCall(method: string, args: RequestParams = {}): Promise<JSONValue> {
    return this.dispatcher.call(
      `method/${method}`,
      { ...args, format: "json" },
      "get",
      { restApi: true },
      checkRestError
    );
  }

  async fqlQuery(fql: string): Promise<JSONValue> {
    return this.restCall("fql.query", { query: fql });
  }
}
