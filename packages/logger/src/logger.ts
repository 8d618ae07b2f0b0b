/**
 * Logger setup
 *
 * Every process in the service logs JSON lines through pino. Two layers keep
 * secrets out of the output:
 *
 * - pino's `redact` censors credential fields by path (see {@link REDACT_PATHS});
 * - a log formatter runs {@link redactValue} over each top-level field, so a
 *   presigned URL logged under any name loses its signature.
 *
 * Development output goes through pino-pretty instead.
 */

import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, redactValue } from "./redactor.js";

export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Defaults to "info", or "debug" when NODE_ENV is "development". */
  level?: string;
  /** Logical service name attached to every line, e.g. "worker". */
  service?: string;
  /** Human-readable output. Defaults to true when NODE_ENV is "development". */
  pretty?: boolean;
  /** Where JSON lines go instead of stdout. Ignored when pretty. */
  destination?: DestinationStream;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

const PRETTY_TRANSPORT: pino.TransportSingleOptions = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "SYS:standard",
    ignore: "pid,hostname",
  },
};

export function redactLogRecord(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).map(([key, value]) => [key, redactValue(key, value)]));
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const pretty = options.pretty ?? isDevelopment();

  const config: pino.LoggerOptions = {
    level: options.level ?? (isDevelopment() ? "debug" : "info"),
    name: options.service ?? "docboard",
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    formatters: { log: redactLogRecord },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (pretty) return pino({ ...config, transport: PRETTY_TRANSPORT });
  return options.destination ? pino(config, options.destination) : pino(config);
}

/** Derive a logger for one component, e.g. `{ component: "upload-task" }`. */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

/** Discards everything; the default for components built in tests. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
