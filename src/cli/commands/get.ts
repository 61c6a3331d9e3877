/**
 * graphlink get -- Fetch a Graph API path and print the JSON.
 */

import { ClientConfig } from "../../sdk/config.js";
import { Dispatcher } from "../../sdk/dispatcher.js";
import { GraphAPI } from "../../sdk/graph-api.js";
import type { TransportBase } from "../../sdk/transport/base.js";
import { createTransport } from "../../sdk/transport/index.js";

export async function getCommand(
  path: string,
  options: { token?: string },
  transport?: TransportBase
): Promise<void> {
  const dispatcher = new Dispatcher({
    transport: transport ?? createTransport(new ClientConfig()),
    accessToken: options.token ?? process.env["GRAPHLINK_ACCESS_TOKEN"] ?? null,
  });
  const result = await new GraphAPI(dispatcher).getObject(path);
  console.log(JSON.stringify(result, null, 2));
}
