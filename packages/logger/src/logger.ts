/**
 * Pino loggers for docguard services. Every line passes through the PII
 * redactor: message strings and top-level string fields have e-mail
 * addresses and SSNs masked, and credential-like keys are censored
 * at any of the first two levels.
 */

import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, redactText, redactValue } from "./pii-redactor.js";

export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Defaults to "debug" when NODE_ENV is "development", otherwise "info". */
  level?: string;
  /** Written to every line as `name`. */
  service?: string;
  /** Receives raw JSON lines instead of stdout; pretty printing is skipped. */
  destination?: DestinationStream;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

function prettyTransport(): pino.TransportSingleOptions {
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
    },
  };
}

function redactFields(fields: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    redacted[key] = redactValue(key, value);
  }
  return redacted;
}

function buildOptions(level: string, service: string): pino.LoggerOptions {
  return {
    level,
    name: service,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      log: redactFields,
    },
    hooks: {
      // Message and printf-style arguments; merged objects go through formatters.log.
      logMethod(args, method) {
        for (let i = 0; i < args.length; i++) {
          const arg: unknown = args[i];
          if (typeof arg === "string") args[i] = redactText(arg);
        }
        method.apply(this, args);
      },
    },
  };
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? (isDevelopment() ? "debug" : "info");
  const base = buildOptions(level, options.service ?? "docguard");

  if (options.destination) {
    return pino(base, options.destination);
  }
  return pino(isDevelopment() ? { ...base, transport: prettyTransport() } : base);
}

/** Child logger carrying request-scoped bindings such as `requestId` or `documentId`. */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

/** A logger that discards everything; the default for components built without one. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
