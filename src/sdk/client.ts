/**
 * A client exposing both the Graph and REST API methods over one
 * dispatcher.
 */

import type { JSONValue } from "../protocol/types.js";
import { Dispatcher, type DispatcherOptions } from "./dispatcher.js";
import { GraphAPI, type GraphAPIMethods } from "./graph-api.js";
import { RestAPI, type RestAPIMethods } from "./rest-api.js";
import type { HTTPVerb, RequestParams } from "./transport/base.js";

export class GraphAndRestAPI implements GraphAPIMethods, RestAPIMethods {
  readonly dispatcher: Dispatcher;
  readonly graph: GraphAPI;
  readonly rest: RestAPI;

  constructor(options: DispatcherOptions) {
    this.dispatcher = new Dispatcher(options);
    this.graph = new GraphAPI(this.dispatcher);
    this.rest = new RestAPI(this.dispatcher);
  }

  graphCall(path: string, args?: RequestParams, verb?: HTTPVerb): Promise<JSONValue> {
    return this.graph.graphCall(path, args, verb);
  }

  getObject(id: string, args?: RequestParams): Promise<JSONValue> {
    return this.graph.getObject(id, args);
  }

  getObjects(ids: string[], args?: RequestParams): Promise<JSONValue> {
    return this.graph.getObjects(ids, args);
  }

  getConnections(id: string, connection: string, args?: RequestParams): Promise<JSONValue> {
    return this.graph.getConnections(id, connection, args);
  }

  putObject(parent: string, connection: string, args?: RequestParams): Promise<JSONValue> {
    return this.graph.putObject(parent, connection, args);
  }

  putWallPost(message: string, attachment?: RequestParams, profileId?: string): Promise<JSONValue> {
    return this.graph.putWallPost(message, attachment, profileId);
  }

  putComment(objectId: string, message: string): Promise<JSONValue> {
    return this.graph.putComment(objectId, message);
  }

  putLike(objectId: string): Promise<JSONValue> {
    return this.graph.putLike(objectId);
  }

  deleteObject(id: string): Promise<JSONValue> {
    return this.graph.deleteObject(id);
  }

  deleteLike(objectId: string): Promise<JSONValue> {
    return this.graph.deleteLike(objectId);
  }

  search(query: string, args?: RequestParams): Promise<JSONValue> {
    return this.graph.search(query, args);
  }

  restCall(method: string, args?: RequestParams): Promise<JSONValue> {
    return this.rest.restCall(method, args);
  }

  fqlQuery(fql: string): Promise<JSONValue> {
    return this.rest.fqlQuery(fql);
  }
}
