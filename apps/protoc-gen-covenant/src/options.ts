/**
 * Plugin Options
 *
 * protoc passes `--covenant_opt` values as one comma-separated string of
 * `key=value` pairs.
 */

import { InvalidOptionError, MissingOptionError } from "@covenant/contract";
import { LOG_LEVELS } from "@covenant/logger";
import { z } from "zod";

export const PluginOptionsSchema = z.object({
	/** Path of the JSON or YAML contract, relative to the protoc working directory */
	contractFile: z.string().min(1),
	/** Extension of relative `_pb` imports in generated code */
	importExtension: z.enum(["js", "ts", "none"]).default("js"),
	logLevel: z.enum(LOG_LEVELS).optional(),
});

export type PluginOptions = z.infer<typeof PluginOptionsSchema>;

type OptionKey = keyof z.input<typeof PluginOptionsSchema>;

const OPTION_KEYS = new Map<string, OptionKey>([
	["contract-file", "contractFile"],
	["contract_file", "contractFile"],
	["import_extension", "importExtension"],
	["import-extension", "importExtension"],
	["log_level", "logLevel"],
	["log-level", "logLevel"],
]);

const OPTION_NAMES: Record<OptionKey, string> = {
	contractFile: "contract-file",
	importExtension: "import_extension",
	logLevel: "log_level",
};

function optionName(path: (string | number)[]): string {
	const [key] = path;
	for (const [option, name] of Object.entries(OPTION_NAMES)) {
		if (option === key) {
			return name;
		}
	}
	return String(key);
}

export function parsePluginParameter(parameter: string): PluginOptions {
	const raw: Partial<Record<OptionKey, string>> = {};

	for (const pair of parameter.split(",")) {
		const trimmed = pair.trim();
		if (trimmed.length === 0) {
			continue;
		}
		const separator = trimmed.indexOf("=");
		const key = separator === -1 ? trimmed : trimmed.slice(0, separator).trim();
		const value = separator === -1 ? "" : trimmed.slice(separator + 1).trim();

		const option = OPTION_KEYS.get(key);
		if (!option) {
			throw new InvalidOptionError(key, "unknown option");
		}
		raw[option] = value;
	}

	if (!raw.contractFile) {
		throw new MissingOptionError("contract-file");
	}

	const result = PluginOptionsSchema.safeParse(raw);
	if (!result.success) {
		const [issue] = result.error.issues;
		throw new InvalidOptionError(optionName(issue?.path ?? []), issue?.message ?? "invalid value");
	}
	return result.data;
}
