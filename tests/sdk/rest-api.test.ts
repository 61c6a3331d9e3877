/**
 * Tests for the REST API methods and the combined client.
 */

import { describe, it, expect } from "vitest";
import pino from "pino";

import { Dispatcher } from "../../src/sdk/dispatcher.js";
import { RestAPI } from "../../src/sdk/rest-api.js";
import { GraphAndRestAPI } from "../../src/sdk/client.js";
import { UpstreamAPIError } from "../../src/protocol/errors.js";
import { FakeTransport } from "../helpers/fake-transport.js";

const silent = pino({ level: "silent" });

describe("RestAPI", () => {
  it("calls a method on the REST server with format=json", async () => {
    const transport = new FakeTransport().respond('[{"uid":5}]');
    const rest = new RestAPI(new Dispatcher({ transport, logger: silent }));

    await expect(rest.fqlQuery("select uid from user where uid = 5")).resolves.toEqual([{ uid: 5 }]);
    expect(transport.lastRequest).toEqual({
      path: "/method/fql.query",
      params: { query: "select uid from user where uid = 5", format: "json" },
      verb: "get",
      options: { restApi: true },
    });
  });

  it("raises error_code bodies", async () => {
    const transport = new FakeTransport().respond(
      '{"error_code":102,"error_msg":"Session key invalid or no longer valid"}'
    );
    const rest = new RestAPI(new Dispatcher({ transport, logger: silent }));
    const err = await rest.restCall("users.getInfo").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamAPIError);
    expect(err).toMatchObject({
      type: "102",
      message: "102: Session key invalid or no longer valid",
    });
  });
});

describe("GraphAndRestAPI", () => {
  it("shares one dispatcher and token between both APIs", async () => {
    const transport = new FakeTransport().respond("{}");
    const api = new GraphAndRestAPI({ transport, accessToken: "user-token", logger: silent });

    await api.getObject("me");
    expect(transport.lastRequest?.params).toEqual({ access_token: "user-token" });
    expect(transport.lastRequest?.options).toEqual({});

    await api.restCall("users.getInfo", { uids: "5" });
    expect(transport.lastRequest?.params).toEqual({
      uids: "5",
      format: "json",
      access_token: "user-token",
    });
    expect(transport.lastRequest?.options).toEqual({ restApi: true });
  });
});
