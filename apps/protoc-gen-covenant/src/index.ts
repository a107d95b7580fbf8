/**
 * protoc-gen-covenant
 *
 * Reads a CodeGeneratorRequest from stdin and writes the response to
 * stdout. Errors go to stderr and the process exits with status 1, with
 * nothing written to stdout.
 */

import { fromBinary, toBinary } from "@bufbuild/protobuf";
import { CodeGeneratorRequestSchema, CodeGeneratorResponseSchema } from "@bufbuild/protobuf/wkt";
import { isCovenantError } from "@covenant/contract";
import { flushLogger, type Logger, type LogLevel } from "@covenant/logger";
import { createPluginLogger } from "./logger.js";
import { parsePluginParameter } from "./options.js";
import { generate } from "./plugin.js";

export { type GenerateDeps, generate } from "./plugin.js";
export { type PluginOptions, PluginOptionsSchema, parsePluginParameter } from "./options.js";

export const PLUGIN_NAME = "protoc-gen-covenant";

async function readAll(stream: AsyncIterable<Buffer | string>): Promise<Uint8Array> {
	const chunks: Buffer[] = [];
	for await (const chunk of stream) {
		chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
	}
	return new Uint8Array(Buffer.concat(chunks));
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export interface PluginIO {
	stdin: AsyncIterable<Buffer | string>;
	stdout: { write(chunk: Uint8Array): boolean };
	stderr: { write(chunk: string): boolean };
}

export type PluginLoggerFactory = (level?: LogLevel) => Logger;

/**
 * Runs the plugin once and returns the exit status. One logger serves the
 * whole run, at the request's `log_level` when it parses. A failure goes to
 * stderr as one plain line; its structured form is logged at debug.
 */
export async function main(io: PluginIO = process, createLogger: PluginLoggerFactory = createPluginLogger): Promise<number> {
	let log: Logger | undefined;
	try {
		const request = fromBinary(CodeGeneratorRequestSchema, await readAll(io.stdin));
		log = createLogger(parsePluginParameter(request.parameter).logLevel);
		const response = await generate(request, { logger: log });
		io.stdout.write(toBinary(CodeGeneratorResponseSchema, response));
		return 0;
	} catch (error) {
		log ??= createLogger();
		log.debug(
			{ error: isCovenantError(error) ? error.toJSON() : describeError(error) },
			"Contract generation failed",
		);
		io.stderr.write(`${PLUGIN_NAME}: ${describeError(error)}\n`);
		return 1;
	} finally {
		if (log) {
			await flushLogger(log);
		}
	}
}
