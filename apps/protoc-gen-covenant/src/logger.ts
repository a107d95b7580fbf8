/**
 * Plugin Logger
 *
 * Writes to stderr: stdout carries the CodeGeneratorResponse.
 */

import { createNodeLogger, isLogLevel, type Logger, type LogLevel } from "@covenant/logger";

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

export function resolveLogLevel(override?: LogLevel): LogLevel {
	if (override) {
		return override;
	}
	const fromEnv = process.env.COVENANT_LOG_LEVEL;
	return fromEnv && isLogLevel(fromEnv) ? fromEnv : DEFAULT_LOG_LEVEL;
}

export function createPluginLogger(level?: LogLevel): Logger {
	return createNodeLogger({
		service: "protoc-gen-covenant",
		level: resolveLogLevel(level),
		pretty: process.env.NODE_ENV === "development",
		destination: 2,
	});
}
