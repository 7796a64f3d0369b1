/**
 * Logger setup
 *
 * Pino instances with secret redaction. Pretty-printed when asked for (or in
 * development), newline-delimited JSON otherwise.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, redactValue } from "./pii-redactor.js";

export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Pino level, including "silent". Defaults to "info" ("debug" in development). */
  level?: string;
  /** Component name attached to every log line. */
  service?: string;
  /** Force pretty output on or off. Defaults to on in development. */
  pretty?: boolean;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

function buildTransport(pretty: boolean): pino.TransportSingleOptions | undefined {
  if (!pretty) return undefined;
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
    },
  };
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const service = options?.service ?? "gapscout";
  const transport = buildTransport(options?.pretty ?? isDevelopment());

  return pino({
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    formatters: {
      log: (object) =>
        Object.fromEntries(Object.entries(object).map(([key, value]) => [key, redactValue(key, value)])),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(transport ? { transport } : {}),
  });
}

/**
 * Child logger carrying per-call bindings such as `requestId` or `docId`.
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
