/**
 * Creates structured Pino logger instances with secret redaction, pretty-printing
 * in development, and JSON output in production / test environments.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, REDACTED } from "./redaction.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when NODE_ENV is "development"). */
  level?: string;
  /** Logical service / component name attached to every log line. */
  service?: string;
  /** Override NODE_ENV detection, mainly for tests. */
  pretty?: boolean;
  /** Write to this stream instead of stdout. Disables pretty-printing. */
  destination?: pino.DestinationStream;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

/**
 * - In **development** we pipe through `pino-pretty` for human-readable output.
 * - In **production / test** we emit structured JSON (no transport needed).
 */
function buildTransport(pretty: boolean): pino.TransportSingleOptions | undefined {
  if (pretty) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }
  return undefined;
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const service = options?.service ?? "ragsync";

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: REDACTED,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options?.destination) {
    return pino(pinoOptions, options.destination);
  }

  const transport = buildTransport(options?.pretty ?? isDevelopment());
  return pino({ ...pinoOptions, ...(transport ? { transport } : {}) });
}

/**
 * Create a child logger that adds request-scoped bindings (e.g. `requestId`, `namespace`).
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

/**
 * A logger that drops everything. Orchestrators fall back to it when none is injected.
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
