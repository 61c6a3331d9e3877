/**
 * Graph API methods.
 *
 * Every call goes through `graphCall`, which turns a body of the form
 * `{"error": {...}}` into an UpstreamAPIError. Whether a call needs a
 * token is the service's decision; a write without one comes back as
 * such an error.
 */

import { UpstreamAPIError } from "../protocol/errors.js";
import { isJSONObject, type JSONValue } from "../protocol/types.js";
import type { Dispatcher, ErrorInspector } from "./dispatcher.js";
import type { HTTPVerb, RequestParams } from "./transport/base.js";

export interface GraphAPIMethods {
  graphCall(path: string, args?: RequestParams, verb?: HTTPVerb): Promise<JSONValue>;
  getObject(id: string, args?: RequestParams): Promise<JSONValue>;
  getObjects(ids: string[], args?: RequestParams): Promise<JSONValue>;
  getConnections(id: string, connection: string, args?: RequestParams): Promise<JSONValue>;
  putObject(parent: string, connection: string, args?: RequestParams): Promise<JSONValue>;
  putWallPost(message: string, attachment?: RequestParams, profileId?: string): Promise<JSONValue>;
  putComment(objectId: string, message: string): Promise<JSONValue>;
  putLike(objectId: string): Promise<JSONValue>;
  deleteObject(id: string): Promise<JSONValue>;
  deleteLike(objectId: string): Promise<JSONValue>;
  search(query: string, args?: RequestParams): Promise<JSONValue>;
}

export const checkGraphError: ErrorInspector = (body) => {
  if (!isJSONObject(body)) {
    return;
  }
  const details = body["error"];
  if (isJSONObject(details)) {
    const { type, message } = details;
    throw new UpstreamAPIError({
      type: typeof type === "string" ? type : undefined,
      message: typeof message === "string" ? message : undefined,
    });
  }
};

export class GraphAPI implements GraphAPIMethods {
  constructor(private readonly dispatcher: Dispatcher) {}

  async graphCall(
    path: string,
    args: RequestParams = {},
    verb: HTTPVerb = "get"
  ): Promise<JSONValue> {
    return this.dispatcher.call(path, args, verb, {}, checkGraphError);
  }

  // Reads

  async getObject(id: string, args: RequestParams = {}): Promise<JSONValue> {
    return this.graphCall(id, args);
  }

  /** Several objects in one request, keyed by id in the response. */
  async getObjects(ids: string[], args: RequestParams = {}): Promise<JSONValue> {
    return this.graphCall("", { ...args, ids: ids.join(",") });
  }

  async getConnections(
    id: string,
    connection: string,
    args: RequestParams = {}
  ): Promise<JSONValue> {
    return this.graphCall(`${id}/${connection}`, args);
  }

  async search(query: string, args: RequestParams = {}): Promise<JSONValue> {
    return this.graphCall("search", { ...args, q: query });
  }

  // Writes

  async putObject(
    parent: string,
    connection: string,
    args: RequestParams = {}
  ): Promise<JSONValue> {
    return this.graphCall(`${parent}/${connection}`, args, "post");
  }

  async putWallPost(
    message: string,
    attachment: RequestParams = {},
    profileId: string = "me"
  ): Promise<JSONValue> {
    return this.putObject(profileId, "feed", { ...attachment, message });
  }

  async putComment(objectId: string, message: string): Promise<JSONValue> {
    return this.putObject(objectId, "comments", { message });
  }

  async putLike(objectId: string): Promise<JSONValue> {
    return this.putObject(objectId, "likes");
  }

  // Deletes

  async deleteObject(id: string): Promise<JSONValue> {
    return this.graphCall(id, {}, "delete");
  }

  async deleteLike(objectId: string): Promise<JSONValue> {
    return this.graphCall(`${objectId}/likes`, {}, "delete");
  }
}
