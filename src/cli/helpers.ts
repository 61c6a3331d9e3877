/**
 * CLI helper utilities shared across commands.
 */

import { ClientConfig } from "../sdk/config.js";
import type { CookieMap } from "../protocol/cookie-session.js";

/** Options every command accepts for picking the app. */
export interface AppOptions {
  appId?: string;
  appSecret?: string;
  callback?: string;
}

/** Build a config from command options, falling back to the environment. */
export function configFromOptions(options: AppOptions): ClientConfig {
  return new ClientConfig({
    appId: options.appId,
    appSecret: options.appSecret,
    oauthCallbackUrl: options.callback,
  });
}

/**
 * Parse a `Cookie:` request header ("a=1; b=2") into a name/value map.
 *
 * Only the first `=` separates name and value; values may contain more.
 */
export function parseCookieHeader(header: string): CookieMap {
  const cookies: Record<string, string> = {};
  for (const part of header.split(";")) {
    const pair = part.trim();
    if (!pair) continue;
    const eq = pair.indexOf("=");
    if (eq < 0) continue;
    cookies[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim();
  }
  return cookies;
}

/**
 * Print an error message to stderr and exit with code 1.
 */
export function cliError(msg: string): never {
  process.stderr.write(msg + "\n");
  process.exit(1);
}
