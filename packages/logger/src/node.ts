import pino, { type Logger, type LoggerOptions } from "pino";
import { mergeRedactPaths } from "./redaction.js";
import type { NodeLoggerOptions, RunContext } from "./types.js";

/**
 * Resolves once everything written so far has reached the destination.
 * Call before exiting: a plugin's stderr is read only after it exits.
 */
export function flushLogger(logger: Logger): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    logger.flush((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

export function createNodeLogger(options: NodeLoggerOptions): Logger {
  const {
    service,
    level = "info",
    version,
    pretty,
    destination = 2,
    redactPaths,
    base = {},
    pinoOptions = {},
  } = options;

  const isPretty = pretty ?? process.env.NODE_ENV === "development";

  const loggerOptions: LoggerOptions = {
    level,
    formatters: {
      level: (label) => ({ severity: label.toUpperCase() }),
      bindings: () => ({}), // Remove pid, hostname
    },
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    redact: {
      paths: mergeRedactPaths(redactPaths),
      censor: "[REDACTED]",
    },
    base: {
      service,
      version,
      ...base,
    },
    ...pinoOptions,
  };

  if (isPretty) {
    return pino(
      loggerOptions,
      pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          destination,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname,service,version",
          customColors: "trace:gray,debug:gray,info:gray,warn:yellow,error:red,fatal:red",
          singleLine: true,
        },
      })
    );
  }
  return pino(loggerOptions, pino.destination({ fd: destination, sync: true }));
}

/**
 * Bind the schema file / service / method being compiled so every line
 * emitted while compiling it can be traced back to the contract entry.
 */
export function withRunContext(logger: Logger, context: RunContext): Logger {
  const bindings: Record<string, string> = {};
  for (const [key, value] of Object.entries(context)) {
    if (value !== undefined) {
      bindings[key] = value;
    }
  }
  return logger.child(bindings);
}
