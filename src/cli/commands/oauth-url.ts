/**
 * graphlink oauth-url -- Print the URL that starts the OAuth dialog.
 */

import { OAuth } from "../../sdk/oauth.js";
import { createTransport } from "../../sdk/transport/index.js";
import { configFromOptions, type AppOptions } from "../helpers.js";

export async function oauthUrlCommand(
  options: AppOptions & { scope?: string }
): Promise<void> {
  const config = configFromOptions(options);
  const oauth = new OAuth(config, createTransport(config));
  console.log(oauth.urlForOAuthCode({ permissions: options.scope }));
}
