/**
 * graphlink signed-request -- Verify a signed request and print its data.
 *
 * OFFLINE: needs only the app secret.
 */

import { parseSignedRequest } from "../../protocol/signed-request.js";
import { configFromOptions, type AppOptions } from "../helpers.js";

export async function signedRequestCommand(
  input: string,
  options: AppOptions & { maxAge?: number }
): Promise<void> {
  const { appSecret } = configFromOptions(options).requireAppCredentials();
  const data = parseSignedRequest(input, appSecret, options.maxAge);
  console.log(JSON.stringify(data, null, 2));
}
