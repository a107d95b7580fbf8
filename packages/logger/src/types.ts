import type { LevelWithSilent, LoggerOptions } from "pino";

export type LogLevel = LevelWithSilent;

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const satisfies readonly LogLevel[];

export interface NodeLoggerOptions {
  /** Name written to every line as `service` */
  service: string;
  level?: LogLevel;
  version?: string;
  /** Pretty-print through pino-pretty instead of JSON lines */
  pretty?: boolean;
  /**
   * File descriptor the logger writes to. Plugins must keep stdout free for
   * their protocol response, so the default is stderr (2).
   */
  destination?: number;
  /** Extra paths to censor, merged with the defaults */
  redactPaths?: string[];
  base?: Record<string, unknown>;
  pinoOptions?: Partial<LoggerOptions>;
}

export interface RunContext {
  /** Schema file being generated */
  file?: string;
  service?: string;
  method?: string;
  /** Contract name from the contract document */
  contract?: string;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
