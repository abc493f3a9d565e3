/**
 * Creates structured pino loggers: pretty-printed in development, JSON in
 * production and test runs.
 */

import pino, { type Logger as PinoLogger, type LevelWithSilent } from "pino";
import { REDACT_CENSOR, REDACT_PATHS } from "./redact.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when NODE_ENV is "development"). */
  level?: LevelWithSilent;
  /** Logical service / component name attached to every log line. */
  service?: string;
  /** File descriptor to write to; CLIs pass 2 to keep stdout for output. Defaults to 1. */
  destination?: number;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

function buildTransport(destination: number): pino.TransportSingleOptions | undefined {
  if (isDevelopment()) {
    return {
      target: "pino-pretty",
      options: {
        destination,
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
  const service = options?.service ?? "studydesk";

  const destination = options?.destination ?? 1;
  const transport = buildTransport(destination);

  const loggerOptions: pino.LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: REDACT_CENSOR,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (transport) {
    return pino({ ...loggerOptions, transport });
  }
  return pino(loggerOptions, pino.destination(destination));
}

/**
 * Derive a component logger, e.g. `{ component: "document-store" }`.
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

/** A logger that drops everything; used by tests and library defaults. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
