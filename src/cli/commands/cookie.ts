/**
 * graphlink cookie -- Verify the session cookie in a Cookie header.
 *
 * OFFLINE: needs only the app id and secret.
 */

import { parseCookieSession } from "../../protocol/cookie-session.js";
import {
  configFromOptions,
  parseCookieHeader,
  type AppOptions,
} from "../helpers.js";

export async function cookieCommand(
  header: string,
  options: AppOptions
): Promise<void> {
  const { appId, appSecret } = configFromOptions(options).requireAppCredentials();
  const session = parseCookieSession(parseCookieHeader(header), appId, appSecret);
  if (!session) {
    console.log("Not logged in.");
    return;
  }
  console.log(JSON.stringify(session, null, 2));
}
