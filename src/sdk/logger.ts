/**
 * Library logging on pino.
 *
 * Silent unless GRAPHLINK_LOG_LEVEL is set. Output goes to stderr so it
 * never mixes with CLI output on stdout. Tokens and secrets are redacted.
 */

import pino from "pino";
import type { Logger as PinoLogger } from "pino";

export type Logger = PinoLogger;

export const LOG_LEVELS = ["silent", "fatal", "error", "warn", "info", "debug", "trace"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Level named by GRAPHLINK_LOG_LEVEL; unknown or empty values mean silent. */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const level = value?.trim().toLowerCase() ?? "";
  return isLogLevel(level) ? level : "silent";
}

export const REDACTION_CONFIG = {
  paths: [
    "access_token",
    "client_secret",
    "appSecret",
    "token",
    "*.access_token",
    "*.client_secret",
    "*.appSecret",
    "params.*",
  ],
  censor: "[REDACTED]",
};

let _rootLogger: Logger | null = null;

export function getRootLogger(): Logger {
  if (!_rootLogger) {
    const level = resolveLogLevel(process.env["GRAPHLINK_LOG_LEVEL"]);

    _rootLogger = pino(
      {
        name: "graphlink",
        level,
        redact: REDACTION_CONFIG,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true })
    );
  }

  return _rootLogger;
}

/** Child logger tagged with `component`. */
export function createLogger(component: string): Logger {
  return getRootLogger().child({ component });
}
