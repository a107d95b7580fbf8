/**
 * Contract Loader
 *
 * Reads a contract document (JSON or YAML) and checks it has the contract
 * shape. Semantic checks (status codes, field values) happen later, while
 * the contract is compiled against the schema.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parse as parseYaml } from "yaml";
import type { z } from "zod";
import { MalformedContractError } from "./errors.js";
import { type Contract, ContractSchema } from "./schemas.js";

export type ContractFormat = "json" | "yaml";

export interface ParseContractOptions {
	format?: ContractFormat;
	/** Label used in error messages, usually the file path */
	source?: string;
}

function formatIssue(issue: z.ZodIssue): string {
	const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
	return `${path}: ${issue.message}`;
}

/**
 * Validate an already-parsed document against the contract shape
 *
 * @throws MalformedContractError listing every shape violation
 */
export function parseContract(document: unknown, source = "<inline>"): Contract {
	const result = ContractSchema.safeParse(document);
	if (!result.success) {
		throw new MalformedContractError(source, "document does not match the contract shape", {
			issues: result.error.issues.map(formatIssue),
			cause: result.error,
		});
	}
	return result.data;
}

export function parseContractText(text: string, options: ParseContractOptions = {}): Contract {
	const { format = "json", source = "<inline>" } = options;

	let document: unknown;
	try {
		document = format === "yaml" ? parseYaml(text) : JSON.parse(text);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new MalformedContractError(source, `cannot parse ${format.toUpperCase()}: ${reason}`, { cause: error });
	}

	return parseContract(document, source);
}

export function detectContractFormat(path: string): ContractFormat {
	const extension = extname(path).toLowerCase();
	return extension === ".yaml" || extension === ".yml" ? "yaml" : "json";
}

/**
 * Load a contract from disk; the format follows the file extension
 */
export async function loadContractFile(path: string): Promise<Contract> {
	let text: string;
	try {
		text = await readFile(path, "utf-8");
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new MalformedContractError(path, `cannot read file: ${reason}`, { cause: error });
	}

	return parseContractText(text, { format: detectContractFormat(path), source: path });
}
