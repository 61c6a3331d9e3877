/**
 * graphlink app-token -- Fetch the app access token.
 */

import { OAuth } from "../../sdk/oauth.js";
import type { TransportBase } from "../../sdk/transport/base.js";
import { createTransport } from "../../sdk/transport/index.js";
import { cliError, configFromOptions, type AppOptions } from "../helpers.js";

export async function appTokenCommand(
  options: AppOptions,
  transport?: TransportBase
): Promise<void> {
  const config = configFromOptions(options);
  const oauth = new OAuth(config, transport ?? createTransport(config));
  const token = await oauth.getAppAccessToken();
  if (!token) {
    cliError("No access token in the response.");
  }
  console.log(token);
}
