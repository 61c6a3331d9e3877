#!/usr/bin/env node
/**
 * graphlink CLI -- verify credentials and poke at the Graph API from a shell.
 *
 * App id and secret come from --app-id/--app-secret or from
 * GRAPHLINK_APP_ID/GRAPHLINK_APP_SECRET.
 */

import { Command, InvalidArgumentError } from "commander";

import { GraphLinkError } from "../protocol/errors.js";
import { appTokenCommand } from "./commands/app-token.js";
import { cookieCommand } from "./commands/cookie.js";
import { getCommand } from "./commands/get.js";
import { oauthUrlCommand } from "./commands/oauth-url.js";
import { signedRequestCommand } from "./commands/signed-request.js";
import { cliError } from "./helpers.js";

function parseSeconds(value: string): number {
  const n = Number.parseInt(value, 10);
  if (Number.isNaN(n) || n < 0) {
    throw new InvalidArgumentError("Must be a non-negative number of seconds.");
  }
  return n;
}

const program = new Command();

program
  .name("graphlink")
  .description("Graph API client: OAuth, cookies and signed requests")
  .version("0.1.0");

// Global options: app credentials (fall back to the environment)
program
  .option("--app-id <id>", "App id (default: $GRAPHLINK_APP_ID)")
  .option("--app-secret <secret>", "App secret (default: $GRAPHLINK_APP_SECRET)");

// ---- signed-request --------------------------------------------------------
program
  .command("signed-request <input>")
  .description("Verify a signed request and print its data")
  .option("--max-age <seconds>", "Maximum age of encrypted requests", parseSeconds)
  .action(async (input: string, opts: { maxAge?: number }) => {
    await signedRequestCommand(input, { ...program.opts(), maxAge: opts.maxAge });
  });

// ---- cookie ----------------------------------------------------------------
program
  .command("cookie <header>")
  .description("Verify the session cookie in a Cookie header")
  .action(async (header: string) => {
    await cookieCommand(header, program.opts());
  });

// ---- oauth-url -------------------------------------------------------------
program
  .command("oauth-url")
  .description("Print the URL that starts the OAuth dialog")
  .option("-c, --callback <url>", "Redirect URI (default: $GRAPHLINK_OAUTH_CALLBACK_URL)")
  .option("-s, --scope <permissions>", "Comma-separated permissions")
  .action(async (opts: { callback?: string; scope?: string }) => {
    await oauthUrlCommand({ ...program.opts(), ...opts });
  });

// ---- app-token -------------------------------------------------------------
program
  .command("app-token")
  .description("Fetch the app access token")
  .action(async () => {
    await appTokenCommand(program.opts());
  });

// ---- get -------------------------------------------------------------------
program
  .command("get <path>")
  .description("Fetch a Graph API path and print the JSON")
  .option("-t, --token <token>", "Access token (default: $GRAPHLINK_ACCESS_TOKEN)")
  .action(async (path: string, opts: { token?: string }) => {
    await getCommand(path, opts);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof GraphLinkError) {
    cliError(`${err.name}: ${err.message}`);
  }
  cliError(err instanceof Error ? err.message : String(err));
});
