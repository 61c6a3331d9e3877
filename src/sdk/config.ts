/**
 * Client configuration.
 *
 * Priority (highest wins): constructor arg > env var > default.
 */

import { z } from "zod";

import { ArgumentError } from "../protocol/errors.js";
import { GRAPH_SERVER, REST_SERVER } from "../protocol/types.js";

const hostSchema = z
  .string()
  .min(1)
  .refine((host) => !host.includes("://"), {
    message: "must be a host name without a scheme",
  });

const configSchema = z.object({
  appId: z.string().min(1).nullable(),
  appSecret: z.string().min(1).nullable(),
  oauthCallbackUrl: z.string().url().nullable(),
  graphServer: hostSchema,
  restServer: hostSchema,
});

export interface ClientConfigOptions {
  appId?: string | number | null;
  appSecret?: string | null;
  oauthCallbackUrl?: string | null;
  graphServer?: string | null;
  restServer?: string | null;
}

function fromEnv(key: string): string | null {
  const value = process.env[key];
  return value ? value : null;
}

export class ClientConfig {
  readonly appId: string | null;
  readonly appSecret: string | null;
  readonly oauthCallbackUrl: string | null;
  readonly graphServer: string;
  readonly restServer: string;

  constructor(options: ClientConfigOptions = {}) {
    const result = configSchema.safeParse({
      appId:
        options.appId != null
          ? String(options.appId)
          : fromEnv("GRAPHLINK_APP_ID"),
      appSecret: options.appSecret ?? fromEnv("GRAPHLINK_APP_SECRET"),
      oauthCallbackUrl:
        options.oauthCallbackUrl ?? fromEnv("GRAPHLINK_OAUTH_CALLBACK_URL"),
      graphServer:
        options.graphServer ?? fromEnv("GRAPHLINK_GRAPH_SERVER") ?? GRAPH_SERVER,
      restServer:
        options.restServer ?? fromEnv("GRAPHLINK_REST_SERVER") ?? REST_SERVER,
    });

    if (!result.success) {
      const issue = result.error.issues[0];
      throw new ArgumentError(
        `Invalid config '${issue.path.join(".")}': ${issue.message}`
      );
    }

    this.appId = result.data.appId;
    this.appSecret = result.data.appSecret;
    this.oauthCallbackUrl = result.data.oauthCallbackUrl;
    this.graphServer = result.data.graphServer;
    this.restServer = result.data.restServer;
  }

  /** App id and secret, or an ArgumentError naming what is missing. */
  requireAppCredentials(): { appId: string; appSecret: string } {
    if (!this.appId || !this.appSecret) {
      throw new ArgumentError(
        "An app id and app secret are required " +
          "(pass them in or set GRAPHLINK_APP_ID and GRAPHLINK_APP_SECRET)"
      );
    }
    return { appId: this.appId, appSecret: this.appSecret };
  }
}
